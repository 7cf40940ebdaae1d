// Tree nodes and their flattening into a navigable linear order

/**
 * A node of an application-owned tree. Views only read the structure and
 * toggle `isExpanded`. Nodes keep no reference to their parent, so a node
 * can be moved between parents freely; parents are resolved per flattening.
 */
export class TreeNode<T = unknown> {
  label: string;
  payload: T | undefined;
  children: TreeNode<T>[];
  isExpanded: boolean;
  private _leaf: boolean;

  constructor(label: string, options: { payload?: T; children?: TreeNode<T>[]; expanded?: boolean; leaf?: boolean } = {}) {
    this.label = label;
    this.payload = options.payload;
    this.children = options.children ?? [];
    this.isExpanded = options.expanded ?? false;
    this._leaf = options.leaf ?? false;
  }

  /** Explicitly marked as a leaf, or has no children */
  get isLeaf(): boolean {
    return this._leaf || this.children.length === 0;
  }

  add(...children: TreeNode<T>[]): this {
    this.children.push(...children);
    return this;
  }

  expanded(): this {
    this.isExpanded = true;
    return this;
  }

  collapsed(): this {
    this.isExpanded = false;
    return this;
  }

  leaf(): this {
    this._leaf = true;
    return this;
  }

  /** Flip `isExpanded`. No-op on leaves; returns whether anything changed. */
  toggle(): boolean {
    if (this.isLeaf) return false;
    this.isExpanded = !this.isExpanded;
    return true;
  }
}

/**
 * One visible node of a flattened tree. Rebuilt on every flattening.
 */
export interface FlatEntry<T = unknown> {
  node: TreeNode<T>;
  depth: number;
  parent: TreeNode<T> | null;
  /** Last among its siblings */
  isLast: boolean;
  /** isLast of each ancestor, outermost first (drives guide lines) */
  ancestorIsLast: boolean[];
}

/**
 * Pre-order traversal of the roots. Children of a node are included only
 * when it is expanded and not a leaf.
 */
export function flattenTree<T>(roots: readonly TreeNode<T>[]): FlatEntry<T>[] {
  const out: FlatEntry<T>[] = [];
  flattenRecursive(roots, 0, null, [], out);
  return out;
}

function flattenRecursive<T>(
  nodes: readonly TreeNode<T>[],
  depth: number,
  parent: TreeNode<T> | null,
  ancestorIsLast: boolean[],
  out: FlatEntry<T>[]
): void {
  for (let i = 0; i < nodes.length; i++) {
    const node = nodes[i];
    const isLast = i === nodes.length - 1;

    out.push({ node, depth, parent, isLast, ancestorIsLast });

    if (!node.isLeaf && node.isExpanded) {
      flattenRecursive(node.children, depth + 1, node, [...ancestorIsLast, isLast], out);
    }
  }
}

/**
 * Index of the entry for `entries[index]`'s parent, found by scanning the
 * current flattening. -1 for roots.
 */
export function findParentIndex<T>(entries: readonly FlatEntry<T>[], index: number): number {
  const parent = entries[index]?.parent;
  if (!parent) return -1;
  for (let i = index - 1; i >= 0; i--) {
    if (entries[i].node === parent) return i;
  }
  return -1;
}

/**
 * Set `isExpanded` on every non-leaf node. Returns the number of nodes changed.
 */
export function setExpandedAll<T>(roots: readonly TreeNode<T>[], expanded: boolean): number {
  let changed = 0;
  const stack = [...roots];
  while (stack.length > 0) {
    const node = stack.pop();
    if (!node) break;
    if (!node.isLeaf && node.isExpanded !== expanded) {
      node.isExpanded = expanded;
      changed++;
    }
    stack.push(...node.children);
  }
  return changed;
}
