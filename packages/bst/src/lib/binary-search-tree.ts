import { iterateInOrder, iteratePostOrder } from './traverse';

//
// Generic node interface for traversal.
//
export interface INode<NodeT> {
    left?: NodeT;
    right?: NodeT;
}

//
// Represents a node in the binary search tree.
//
export interface BstNode {
    key: number; // The key stored in this node. Unique within the tree.
    left?: BstNode; // Subtree of keys strictly less than `key`.
    right?: BstNode; // Subtree of keys strictly greater than `key`.
}

//
// Represents the binary search tree itself.
//
export interface IBinarySearchTree {
    //
    // The root of the tree, undefined when the tree is empty.
    //
    root?: BstNode;
}

//
// Identifies the slot a node hangs from: either the tree's root or a child link of a parent node.
//
type Slot =
    | { tree: IBinarySearchTree }
    | { parent: BstNode; side: 'left' | 'right' };

/**
 * Creates an empty tree.
 */
export function createTree(): IBinarySearchTree {
    return {};
}

/**
 * Create a new node for a key.
 */
export function createNode(key: number): BstNode {
    return { key };
}

//
// Throws if the key isn't a safe integer.
//
function checkKey(key: number): void {
    if (!Number.isSafeInteger(key)) {
        throw new Error(`Key must be a safe integer, got ${key}.`);
    }
}

function readSlot(slot: Slot): BstNode | undefined {
    if ('tree' in slot) {
        return slot.tree.root;
    }
    return slot.parent[slot.side];
}

function writeSlot(slot: Slot, node: BstNode | undefined): void {
    if ('tree' in slot) {
        slot.tree.root = node;
    }
    else {
        slot.parent[slot.side] = node;
    }
}

//
// Finds the slot that holds the key, or the empty slot where it would be inserted.
//
function findSlot(tree: IBinarySearchTree, key: number): Slot {
    let parent: BstNode | undefined = undefined;
    let side: 'left' | 'right' = 'left';
    let node = tree.root;
    while (node && node.key !== key) {
        parent = node;
        side = key > node.key ? 'right' : 'left';
        node = node[side];
    }
    return parent ? { parent, side } : { tree };
}

/**
 * Inserts a key into the tree.
 * Inserting a key that is already present leaves the tree unchanged.
 */
export function insertKey(tree: IBinarySearchTree, key: number): IBinarySearchTree {
    checkKey(key);

    const slot = findSlot(tree, key);
    if (!readSlot(slot)) {
        writeSlot(slot, createNode(key));
    }

    return tree;
}

//
// Returns the rightmost node of the subtree hanging from `slot`, the one with the greatest key,
// along with the slot that holds it.
//
function getMax(node: BstNode, slot: Slot): { node: BstNode; slot: Slot } {
    while (node.right) {
        slot = { parent: node, side: 'right' };
        node = node.right;
    }
    return { node, slot };
}

/**
 * Removes a key from the tree. Removing a key that isn't present leaves the tree unchanged.
 *
 * A node with two children keeps its place in the tree: it takes the key of its
 * in-order predecessor (the maximum of its left subtree) and the predecessor is removed instead.
 */
export function deleteKey(tree: IBinarySearchTree, key: number): IBinarySearchTree {
    checkKey(key);

    const slot = findSlot(tree, key);
    const node = readSlot(slot);
    if (!node) {
        return tree; // Not in the tree.
    }

    if (!node.left || !node.right) {
        // Leaf or single child: the child subtree (if any) takes the node's place.
        writeSlot(slot, node.left ?? node.right);
        node.left = undefined;
        node.right = undefined;
        return tree;
    }

    const predecessor = getMax(node.left, { parent: node, side: 'left' });
    node.key = predecessor.node.key;
    writeSlot(predecessor.slot, predecessor.node.left); // The predecessor never has a right child.
    predecessor.node.left = undefined;
    return tree;
}

/**
 * Returns true if the key is in the tree.
 */
export function findKey(tree: IBinarySearchTree, key: number): boolean {
    checkKey(key);

    let node = tree.root;
    while (node) {
        if (key > node.key) {
            node = node.right;
        }
        else if (key < node.key) {
            node = node.left;
        }
        else {
            return true;
        }
    }
    return false;
}

/**
 * Counts the nodes on the deepest path from the root.
 * An empty tree has height 0 and a single node has height 1.
 */
export function height(tree: IBinarySearchTree): number {
    if (!tree.root) {
        return 0;
    }

    // Level by level, so degenerate trees don't blow the call stack.
    let level: BstNode[] = [tree.root];
    let levels = 0;
    while (level.length > 0) {
        levels += 1;
        const next: BstNode[] = [];
        for (const node of level) {
            if (node.left) {
                next.push(node.left);
            }
            if (node.right) {
                next.push(node.right);
            }
        }
        level = next;
    }
    return levels;
}

/**
 * Lists the keys in ascending order.
 *
 * The result is lazy and can be iterated any number of times. Each iteration
 * walks the tree as it is when the iteration starts.
 */
export function inOrder(tree: IBinarySearchTree): Iterable<number> {
    return {
        *[Symbol.iterator]() {
            for (const node of iterateInOrder<BstNode>(tree.root)) {
                yield node.key;
            }
        },
    };
}

/**
 * Releases every node of the tree, children before parents, and empties the tree.
 *
 * @returns The number of nodes released.
 */
export function purge(tree: IBinarySearchTree): number {
    let released = 0;
    for (const node of iteratePostOrder<BstNode>(tree.root)) {
        // Children have already been visited, so the links can go.
        node.left = undefined;
        node.right = undefined;
        released += 1;
    }
    tree.root = undefined;
    return released;
}
