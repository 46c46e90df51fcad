import { Command, CommanderError, OutputConfiguration } from 'commander';
import { menuCommand } from './cmd/menu';
import { showCommand } from './cmd/show';
import { exit, EXIT_FAILURE, EXIT_SUCCESS } from 'node-utils';
import { FatalError, log } from 'utils';
import pc from "picocolors";

//
// Builds the `bst` program and its commands.
//
export function createProgram(output?: OutputConfiguration): Command {

    const verboseOption: [string, string, boolean] = ["-v, --verbose", "Enables verbose logging.", false];
    const debugOption: [string, string, boolean] = ["--debug", "Enables debug logging, including a drawing of the tree after each change.", false];

    const program = new Command();

    // Settings made before the commands are added are inherited by them.
    if (output) {
        program.configureOutput(output);
    }

    program
        .name("bst")
        .description(`A command-line tool for building and inspecting binary search trees of whole numbers.`)
        .version('1.0.0')
        .addHelpText('after', `

Examples:
  ${pc.bold("bst")}                                  Start the interactive menu
  ${pc.bold("bst show 5 3 8 1 4")}                   Build a tree and show it
  ${pc.bold("bst show 5 3 8 1 4 --delete 5")}        Build a tree, delete a key and show it`)
        .exitOverride();  // Prevent commander from calling process.exit

    program
        .command("menu", { isDefault: true })
        .description("Interactively insert, delete and find keys in a tree.")
        .option(...verboseOption)
        .option(...debugOption)
        .allowExcessArguments(false)  // A mistyped command is an error, not a reason to start the menu.
        .addHelpText('after', `

Examples:
  ${pc.bold("bst menu")}
  ${pc.bold("bst menu --debug")}`)
        .action(menuCommand);

    program
        .command("show")
        .description("Builds a tree by inserting the keys in order, then shows it.")
        .argument("<keys...>", "The keys to insert. Negative keys are allowed.")
        .option("-d, --delete <keys...>", "Keys to delete once all keys are inserted.")
        .option("-r, --rotated", "Draw the tree rotated, with the right subtree on top.", false)
        .option(...verboseOption)
        .option(...debugOption)
        .addHelpText('after', `

Examples:
  ${pc.bold("bst show 5 3 8 1 4")}
  ${pc.bold("bst show 5 -3 8 -1 4")}
  ${pc.bold("bst show 5 3 8 1 4 --rotated")}
  ${pc.bold("bst show 5 3 8 1 4 -d 5 1")}
  ${pc.bold("bst show -- 5 -3")}                    Everything after -- is a key`)
        .action(showCommand);

    return program;
}

export async function main(argv: string[], output?: OutputConfiguration): Promise<void> {
    const program = createProgram(output);

    // Parse the command line arguments
    try {
        await program.parseAsync(argv);
    }
    catch (err: unknown) {
        if (!(err instanceof CommanderError)) {
            throw err;
        }

        if (err.code === 'commander.help'
            || err.code === 'commander.helpDisplayed'
            || err.code === 'commander.version') {
            return exit(EXIT_SUCCESS);
        }

        // Commander has already printed the problem.
        return exit(EXIT_FAILURE);
    }
}

//
// Handles errors in a consistent way.
//
export function handleError(error: unknown) {
    if (error instanceof FatalError) {
        // Expected, user-facing problem: no stack trace.
        log.error(pc.red(error.message));
        return;
    }

    log.error(pc.red('An error occurred:'));
    if (error instanceof Error) {
        // The stack starts with the message.
        log.error(pc.red(error.stack || error.message));
    }
    else {
        log.error(pc.red(String(error)));
    }
}

if (require.main === module) {
    main(process.argv)
        .catch(async (error: unknown) => {
            handleError(error);
            return exit(EXIT_FAILURE);
        });
}
