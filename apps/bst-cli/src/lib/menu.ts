import {
    IBinarySearchTree,
    createTree,
    deleteKey,
    findKey,
    height,
    inOrder,
    insertKey,
    printTree,
} from "bst";
import { formatKeys } from "./format";

export type MenuOption = "insert" | "delete" | "find" | "height" | "in-order" | "print" | "quit";

export interface IMenuChoice {
    value: MenuOption;
    label: string;
}

//
// The options offered by the menu, in the order they are shown.
//
export const MENU_CHOICES: IMenuChoice[] = [
    { value: "insert", label: "Insert node" },
    { value: "delete", label: "Delete node" },
    { value: "find", label: "Find a node" },
    { value: "height", label: "Get current height" },
    { value: "in-order", label: "Print tree in ascending order" },
    { value: "print", label: "Print tree" },
    { value: "quit", label: "Quit" },
];

export function isMenuOption(value: unknown): value is MenuOption {
    return MENU_CHOICES.some(choice => choice.value === value);
}

//
// The prompt for the key of each option that takes one.
//
const KEY_PROMPTS: Partial<Record<MenuOption, string>> = {
    insert: "Enter the new node's value:",
    delete: "Enter the value to be removed:",
    find: "Enter the searched value:",
};

//
// State held across the menu loop.
//
export interface IMenuSession {
    //
    // The one tree the menu works on for the life of the program.
    //
    tree: IBinarySearchTree;
}

export interface IMenuResult {
    //
    // Lines to show the user.
    //
    lines: string[];

    //
    // Set when the user asked to leave the menu.
    //
    quit: boolean;
}

export function createMenuSession(): IMenuSession {
    return { tree: createTree() };
}

//
// Returns the prompt to ask for a key before running the option, or undefined if the option doesn't take one.
// Deleting from an empty tree doesn't ask for a key.
//
export function getKeyPrompt(session: IMenuSession, option: MenuOption): string | undefined {
    if (option === "delete" && !session.tree.root) {
        return undefined;
    }
    return KEY_PROMPTS[option];
}

function requireOptionKey(option: MenuOption, key: number | undefined): number {
    if (key === undefined) {
        throw new Error(`Menu option "${option}" needs a key.`);
    }
    return key;
}

//
// Runs one menu option against the session's tree.
//
export function executeMenuOption(session: IMenuSession, option: MenuOption, key?: number): IMenuResult {
    const tree = session.tree;

    switch (option) {
        case "insert": {
            const value = requireOptionKey(option, key);
            if (findKey(tree, value)) {
                return { lines: [`${value} is already in the tree.`], quit: false };
            }
            insertKey(tree, value);
            return { lines: [`Inserted ${value}.`], quit: false };
        }

        case "delete": {
            if (!tree.root) {
                return { lines: ["Tree is already empty!"], quit: false };
            }
            const value = requireOptionKey(option, key);
            if (!findKey(tree, value)) {
                return { lines: [`${value} is not in the tree.`], quit: false };
            }
            deleteKey(tree, value);
            return { lines: [`Removed ${value}.`], quit: false };
        }

        case "find": {
            const found = findKey(tree, requireOptionKey(option, key));
            return {
                lines: [found ? "The value is in the tree." : "The value is not in the tree."],
                quit: false,
            };
        }

        case "height":
            return { lines: [`Current height of the tree is: ${height(tree)}`], quit: false };

        case "in-order":
            return { lines: [formatKeys(inOrder(tree))], quit: false };

        case "print":
            return { lines: printTree(tree).split("\n"), quit: false };

        case "quit":
            return { lines: [], quit: true };
    }
}
