import type { IOrdering } from "../ordering";

//
// Graph structures an array can be viewed as for graph-based searching.
//
export type GraphShape = "binary-search-tree" | "complete-binary-tree" | "linked-list";

export const GRAPH_SHAPES: readonly GraphShape[] = ["binary-search-tree", "complete-binary-tree", "linked-list"];

//
// A node of a graph view. The id is the index of the node's value in the source array.
//
export interface IGraphNode<T> {
    readonly id: number;
    readonly value: T;
    readonly left?: number;
    readonly right?: number;
    readonly next?: number;
}

export interface IGraphView<T> {
    readonly shape: GraphShape;

    //
    // Undefined when the view is empty.
    //
    readonly root: number | undefined;

    //
    // Nodes indexed by id.
    //
    readonly nodes: readonly IGraphNode<T>[];
}

interface IMutableNode<T> {
    id: number;
    value: T;
    left?: number;
    right?: number;
    next?: number;
}

function freezeView<T>(shape: GraphShape, nodes: IMutableNode<T>[]): IGraphView<T> {
    return Object.freeze({
        shape,
        root: nodes.length > 0 ? 0 : undefined,
        nodes: Object.freeze(nodes.map(node => Object.freeze(node))),
    });
}

//
// Binary search tree built by inserting the elements in array order.
// The first element is the root; equal values go to the right.
//
export function toBinarySearchTree<T>(elements: readonly T[], ordering: IOrdering<T>): IGraphView<T> {
    const nodes: IMutableNode<T>[] = elements.map((value, id) => ({ id, value }));

    for (let id = 1; id < nodes.length; id++) {
        let current = nodes[0];
        while (true) {
            if (ordering.compare(nodes[id].value, current.value) < 0) {
                if (current.left === undefined) {
                    current.left = id;
                    break;
                }
                current = nodes[current.left];
            }
            else {
                if (current.right === undefined) {
                    current.right = id;
                    break;
                }
                current = nodes[current.right];
            }
        }
    }

    return freezeView("binary-search-tree", nodes);
}

//
// Complete binary tree in heap layout: node i has children 2i + 1 and 2i + 2.
//
export function toCompleteBinaryTree<T>(elements: readonly T[]): IGraphView<T> {
    const nodes = elements.map((value, id): IMutableNode<T> => {
        const node: IMutableNode<T> = { id, value };
        if (2 * id + 1 < elements.length) {
            node.left = 2 * id + 1;
        }
        if (2 * id + 2 < elements.length) {
            node.right = 2 * id + 2;
        }
        return node;
    });
    return freezeView("complete-binary-tree", nodes);
}

//
// Singly linked list in array order.
//
export function toLinkedList<T>(elements: readonly T[]): IGraphView<T> {
    const nodes = elements.map((value, id): IMutableNode<T> => {
        return id < elements.length - 1 ? { id, value, next: id + 1 } : { id, value };
    });
    return freezeView("linked-list", nodes);
}

export function toGraphView<T>(elements: readonly T[], shape: GraphShape, ordering: IOrdering<T>): IGraphView<T> {
    switch (shape) {
        case "binary-search-tree":
            return toBinarySearchTree(elements, ordering);
        case "complete-binary-tree":
            return toCompleteBinaryTree(elements);
        case "linked-list":
            return toLinkedList(elements);
    }
}

//
// Outgoing edges of a node in traversal order: left, right, next.
//
export function childrenOf<T>(node: IGraphNode<T>): number[] {
    const children: number[] = [];
    if (node.left !== undefined) {
        children.push(node.left);
    }
    if (node.right !== undefined) {
        children.push(node.right);
    }
    if (node.next !== undefined) {
        children.push(node.next);
    }
    return children;
}
