import { BstNode, IBinarySearchTree } from "./binary-search-tree";

/**
 * Visualize a subtree in simple ASCII format, one key per line.
 * Child lines are labelled `L:` or `R:` so a lone child shows which side it hangs from.
 */
export function visualizeNode(node: BstNode | undefined, prefix: string = '', isLast: boolean = true, label: string = ''): string {
    if (!node) return '';

    interface Line {
        node: BstNode;
        prefix: string;
        isLast: boolean;
        label: string;
    }

    let result = '';
    const stack: Line[] = [{ node, prefix, isLast, label }];
    let line = stack.pop();
    while (line) {
        const connector = line.isLast ? '└── ' : '├── ';
        result += line.prefix + connector + line.label + line.node.key + '\n';

        // Add children, right first so the left child is drawn first.
        const newPrefix = line.prefix + (line.isLast ? '    ' : '│   ');
        if (line.node.right) {
            stack.push({ node: line.node.right, prefix: newPrefix, isLast: true, label: 'R: ' });
        }
        if (line.node.left) {
            stack.push({ node: line.node.left, prefix: newPrefix, isLast: !line.node.right, label: 'L: ' });
        }

        line = stack.pop();
    }

    return result;
}

/**
 * Visualize the whole tree top down.
 */
export function visualizeTree(tree: IBinarySearchTree): string {
    if (!tree.root) {
        return "Empty tree";
    }

    return visualizeNode(tree.root);
}

//
// Prints the tree rotated a quarter turn: the right subtree above its parent, the left subtree below,
// each key indented by `indent` spaces per level of depth.
//
export function printTree(tree: IBinarySearchTree, indent: number = 10): string {
    if (!tree.root) {
        return "Tree is empty!";
    }

    interface Entry {
        node: BstNode;
        depth: number;
    }

    const lines: string[] = [];
    const stack: Entry[] = [];
    let current: Entry | undefined = { node: tree.root, depth: 0 };
    while (current || stack.length > 0) {
        // Reverse in-order: right, node, left.
        while (current) {
            stack.push(current);
            current = current.node.right ? { node: current.node.right, depth: current.depth + 1 } : undefined;
        }

        const next = stack.pop();
        if (!next) {
            break;
        }

        lines.push(" ".repeat(next.depth * indent) + next.node.key);
        current = next.node.left ? { node: next.node.left, depth: next.depth + 1 } : undefined;
    }

    return lines.join("\n");
}
