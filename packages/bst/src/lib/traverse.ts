import { INode } from "./binary-search-tree";

/**
 * Generic tree traversal function that calls a callback for each node, parent before children.
 * The callback can return false to skip the children of that node.
 */
export function traverseTreeSync<NodeT extends INode<NodeT>>(node: NodeT | undefined, callback: (node: NodeT) => boolean): void {
    if (!node) {
        return;
    }

    if (!callback(node)) {
        return; // Skip the children.
    }

    traverseTreeSync<NodeT>(node.left, callback);
    traverseTreeSync<NodeT>(node.right, callback);
}

//
// Iterates the nodes of a tree left subtree first, then the node, then the right subtree.
// Uses an explicit stack so the depth of the tree doesn't matter.
//
export function* iterateInOrder<NodeT extends INode<NodeT>>(node: NodeT | undefined): Generator<NodeT> {
    const stack: NodeT[] = [];
    let current = node;
    while (current || stack.length > 0) {
        while (current) {
            stack.push(current);
            current = current.left;
        }

        const next = stack.pop();
        if (!next) {
            return;
        }

        yield next;
        current = next.right;
    }
}

//
// Iterates the nodes of a tree children first: left subtree, right subtree, then the node.
// A node's child links are read before the node is yielded and never after,
// so the consumer is free to unlink the node it receives.
//
export function* iteratePostOrder<NodeT extends INode<NodeT>>(node: NodeT | undefined): Generator<NodeT> {
    if (!node) {
        return;
    }

    const stack: { node: NodeT, expanded: boolean }[] = [{ node, expanded: false }];
    while (stack.length > 0) {
        const entry = stack.pop();
        if (!entry) {
            return;
        }

        if (entry.expanded) {
            yield entry.node;
            continue;
        }

        // Pushed in reverse so the left subtree comes off the stack first.
        stack.push({ node: entry.node, expanded: true });
        if (entry.node.right) {
            stack.push({ node: entry.node.right, expanded: false });
        }
        if (entry.node.left) {
            stack.push({ node: entry.node.left, expanded: false });
        }
    }
}
