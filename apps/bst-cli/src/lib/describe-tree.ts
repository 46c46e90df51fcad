import { IBinarySearchTree, height, inOrder, printTree, visualizeTree } from "bst";
import pc from "picocolors";
import { formatKeys } from "./format";

export interface IDescribeTreeOptions {
    //
    // Draw the tree rotated, right subtree on top, instead of top down.
    //
    rotated?: boolean;
}

//
// Builds the lines that summarize a tree: its keys in order, its height and a drawing of it.
//
export function describeTree(tree: IBinarySearchTree, options: IDescribeTreeOptions = {}): string[] {
    const drawing = options.rotated ? printTree(tree) : visualizeTree(tree).trimEnd();
    return [
        `${pc.bold("In order")}: ${formatKeys(inOrder(tree))}`,
        `${pc.bold("Height")}: ${height(tree)}`,
        "",
        pc.gray("=".repeat(50)),
        ...drawing.split("\n"),
        pc.gray("=".repeat(50)),
    ];
}
