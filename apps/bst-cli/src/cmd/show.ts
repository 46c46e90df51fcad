import pc from "picocolors";
import { createTree, deleteKey, insertKey, purge } from "bst";
import { exit, registerTerminationCallback, EXIT_SUCCESS } from "node-utils";
import { log } from "utils";
import { configureLog } from "../lib/log";
import { describeTree } from "../lib/describe-tree";
import { requireKey } from "../lib/parse-key";

export interface IShowCommandOptions {
    //
    // Keys to delete after all keys have been inserted.
    //
    delete?: string[];

    //
    // Draw the tree rotated instead of top down.
    //
    rotated?: boolean;

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
// Command to build a tree from keys on the command line and show it.
//
export async function showCommand(keys: string[], options: IShowCommandOptions): Promise<void> {
    configureLog(options);

    // Parse everything up front so bad input fails before any output.
    const toInsert = keys.map(requireKey);
    const toDelete = (options.delete ?? []).map(requireKey);

    const tree = createTree();
    registerTerminationCallback(() => {
        const released = purge(tree);
        log.verbose(`Released ${released} node(s).`);
    });

    for (const key of toInsert) {
        log.verbose(pc.gray(`Inserting ${key}`));
        insertKey(tree, key);
    }

    for (const key of toDelete) {
        log.verbose(pc.gray(`Deleting ${key}`));
        deleteKey(tree, key);
    }

    log.info(pc.blue("\nBinary Search Tree:"));
    for (const line of describeTree(tree, { rotated: options.rotated })) {
        log.info(line);
    }

    await exit(EXIT_SUCCESS);
}
