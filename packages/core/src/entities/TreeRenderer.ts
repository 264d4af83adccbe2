import { InvalidArgumentError } from '../errors/tree.js';
import { cfg } from '../utils/config.js';
import type { NodeEntry, NodeFilter, SortKey, Tree } from './Tree.js';
import { DISPLAY_CONFIG, LINE_STYLES, type LineType, isLineType } from './TreeConstants.js';
import type { NodeKey } from './TreeIndex.js';
import type { TreeNode } from './TreeNode.js';

export interface ShowOptions<N extends TreeNode> {
  /** Node from which rendering starts, root by default */
  nid?: string | null;
  /** Nodes failing the filter are hidden along with their descendants */
  filter?: NodeFilter<N>;
  sortKey?: SortKey<N>;
  reverse?: boolean;
  lineType?: LineType;
  /** Stop after this many lines */
  limit?: number;
  lineMaxLength?: number;
  displayKey?: boolean;
  keyDelimiter?: string;
}

export type NodeLocation<N> = [isLastList: readonly boolean[], key: NodeKey | null, node: N];

/**
 * Compares sort values; `null` (the root key) sorts first
 */
export function compareSortValues(
  a: string | number | null,
  b: string | number | null
): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}

/**
 * Sorts sibling entries by sort key. Stable, so ties keep their index order
 * in both directions.
 */
export function sortEntries<N extends TreeNode>(
  entries: NodeEntry<N>[],
  sortKey: SortKey<N> | undefined,
  reverse: boolean
): NodeEntry<N>[] {
  const valueOf: SortKey<N> = sortKey ?? ((key) => key);
  const direction = reverse ? -1 : 1;
  return entries.sort(
    ([keyA, nodeA], [keyB, nodeB]) =>
      direction * compareSortValues(valueOf(keyA, nodeA), valueOf(keyB, nodeB))
  );
}

/**
 * Yields nodes in depth-first pre-order along with, for each depth, whether
 * the node is the last displayed child at that depth.
 */
export function* iterNodesWithLocation<N extends TreeNode>(
  tree: Tree<N>,
  nid: string,
  options: Pick<ShowOptions<N>, 'filter' | 'sortKey' | 'reverse'>,
  isLastList: readonly boolean[] = []
): Generator<NodeLocation<N>, void, undefined> {
  const { filter, sortKey, reverse = false } = options;
  const [key, node] = tree.get(nid);
  if (filter && !filter(key, node)) return;

  yield [isLastList, key, node];

  const children = tree
    .children(nid)
    .filter(([childKey, child]) => !filter || filter(childKey, child));
  const idxLast = children.length - 1;
  sortEntries(children, sortKey, reverse);
  for (const [idx, [, child]] of children.entries()) {
    yield* iterNodesWithLocation(tree, child.identifier, options, [
      ...isLastList,
      idx === idxLast,
    ]);
  }
}

/**
 * Tree-drawing prefix for a node, `└── ` / `├── ` preceded by one column per ancestor level
 */
export function linePrefixRepr(lineType: LineType, isLastList: readonly boolean[]): string {
  const [verticalLine, lineBox, lineCorner] = LINE_STYLES[lineType];
  if (isLastList.length === 0) return '';
  const leading = isLastList
    .slice(0, -1)
    .map((isLast) => (isLast ? ' '.repeat(4) : `${verticalLine}${' '.repeat(3)}`))
    .join('');
  return leading + (isLastList[isLastList.length - 1] ? lineCorner : lineBox);
}

/**
 * Assembles one output line. When the right-hand part does not fit, the line
 * is cut and ends with an ellipsis, exactly `lineMaxLength` characters long.
 */
export function lineRepr(
  prefix: string,
  isKeyDisplayed: boolean,
  keyDelimiter: string,
  nodeStart: string,
  nodeEnd: string,
  lineMaxLength: number
): string {
  const line = `${prefix}${isKeyDisplayed ? keyDelimiter : ''}${nodeStart}`;
  if (line.length + nodeEnd.length > lineMaxLength) {
    const ellipsis = DISPLAY_CONFIG.ELLIPSIS;
    return line.slice(0, lineMaxLength - ellipsis.length) + ellipsis;
  }
  if (!nodeEnd) return line;
  return line.padEnd(lineMaxLength - nodeEnd.length) + nodeEnd;
}

/**
 * Renders a tree (or the subtree at `nid`) in hierarchy style, one line per node:
 *
 * ```
 * {}
 * ├── a: {}
 * │   └── b: []
 * └── c: []
 * ```
 */
export function renderTree<N extends TreeNode>(tree: Tree<N>, options: ShowOptions<N> = {}): string {
  const {
    lineType = cfg.TREE_LINE_TYPE,
    limit,
    lineMaxLength = cfg.TREE_LINE_MAX_LENGTH,
    displayKey = true,
    keyDelimiter = DISPLAY_CONFIG.DEFAULT_KEY_DELIMITER,
  } = options;

  if (!isLineType(lineType)) {
    throw new InvalidArgumentError(`Unknown line type <${String(lineType)}>`, 'lineType', 'show');
  }
  if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidArgumentError('Limit must be a positive integer', 'limit', 'show');
  }
  if (!Number.isInteger(lineMaxLength) || lineMaxLength <= DISPLAY_CONFIG.ELLIPSIS.length) {
    throw new InvalidArgumentError(
      `Line max length must be an integer above ${DISPLAY_CONFIG.ELLIPSIS.length}`,
      'lineMaxLength',
      'show'
    );
  }

  const start = options.nid ?? tree.root;
  if (start === null) return '';

  let output = '';
  let remaining = limit;
  for (const [isLastList, key, node] of iterNodesWithLocation(tree, start, options)) {
    const isKeyDisplayed = displayKey && typeof key === 'string';
    const prefix = linePrefixRepr(lineType, isLastList) + (isKeyDisplayed ? key : '');
    const [nodeStart, nodeEnd] = node.lineRepr(isLastList.length);
    output += `${lineRepr(prefix, isKeyDisplayed, keyDelimiter, nodeStart, nodeEnd, lineMaxLength)}\n`;

    if (remaining !== undefined) {
      remaining -= 1;
      if (remaining === 0) {
        output += `...\n(truncated, total number of nodes: ${tree.size})\n`;
        return output;
      }
    }
  }
  return output;
}
