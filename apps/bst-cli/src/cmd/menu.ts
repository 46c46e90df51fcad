import { intro, outro, select, text, isCancel, note } from "@clack/prompts";
import pc from "picocolors";
import { purge, visualizeTree } from "bst";
import { exit, registerTerminationCallback, EXIT_SUCCESS } from "node-utils";
import { log } from "utils";
import { configureLog } from "../lib/log";
import { MENU_CHOICES, createMenuSession, executeMenuOption, getKeyPrompt, isMenuOption } from "../lib/menu";
import { parseKey, validateKey } from "../lib/parse-key";

export interface IMenuCommandOptions {
    //
    // Enables verbose logging.
    //
    verbose?: boolean;

    //
    // Enables debug logging.
    //
    debug?: boolean;
}

//
// Command that walks the user through building and querying a tree, one menu option at a time.
//
export async function menuCommand(options: IMenuCommandOptions): Promise<void> {
    configureLog(options);

    const session = createMenuSession();

    // The tree is released once, on the way out, however the program ends.
    registerTerminationCallback(() => {
        const released = purge(session.tree);
        log.verbose(`Released ${released} node(s).`);
    });

    log.info('');
    intro(pc.cyan('🌳 Binary search tree'));

    while (true) {
        const choice = await select({
            message: 'What would you like to do?',
            options: MENU_CHOICES.map(item => ({ value: item.value, label: item.label })),
        });

        if (isCancel(choice) || !isMenuOption(choice)) {
            outro(pc.gray('Cancelled.'));
            return exit(EXIT_SUCCESS);
        }

        let key: number | undefined = undefined;
        const keyPrompt = getKeyPrompt(session, choice);
        if (keyPrompt) {
            const input = await text({
                message: keyPrompt,
                validate: validateKey,
            });

            if (isCancel(input)) {
                outro(pc.gray('Cancelled.'));
                return exit(EXIT_SUCCESS);
            }

            key = parseKey(input);
        }

        log.verbose(`Running "${choice}"${key !== undefined ? ` with key ${key}` : ''}.`);

        const result = executeMenuOption(session, choice, key);
        if (result.quit) {
            outro(pc.green('Goodbye.'));
            return exit(EXIT_SUCCESS);
        }

        note(result.lines.join('\n'));
        log.debug(visualizeTree(session.tree));
    }
}
