// src/analyzer/parsers/tree-sitter-utils.ts
import Parser from 'tree-sitter';
import { ParserError } from '../../utils/errors.js';

export type SyntaxNode = Parser.SyntaxNode;

const COMMENT_TYPES = new Set(['comment', 'line_comment', 'block_comment']);

export function getNodeText(node: SyntaxNode | null | undefined): string {
    return node?.text ?? '';
}

/** 1-based line on which the node starts. */
export function startLine(node: SyntaxNode): number {
    return node.startPosition.row + 1;
}

/**
 * Last source line reached by any token inside `node`. Comments and
 * zero-width tokens are ignored, and a token ending at column 0 is taken to
 * end on the previous line.
 */
export function lastTokenLine(node: SyntaxNode): number {
    let last = startLine(node);
    const walk = (current: SyntaxNode): void => {
        if (COMMENT_TYPES.has(current.type)) return;
        if (current.childCount === 0) {
            if (current.startIndex === current.endIndex) return;
            const { row, column } = current.endPosition;
            const endRow = column === 0 && row > current.startPosition.row ? row - 1 : row;
            last = Math.max(last, endRow + 1);
            return;
        }
        for (const child of current.children) {
            walk(child);
        }
    };
    walk(node);
    return last;
}

// Literals whose inner pieces do not count as separate lines
const ATOMIC_TYPES = new Set(['string', 'concatenated_string']);

/**
 * Greatest start line among `node` and its named descendants, skipping
 * comments. A string literal counts by its opening line, so a trailing
 * multi-line docstring ends the function where it starts.
 */
export function lastDescendantStartLine(node: SyntaxNode): number {
    let last = startLine(node);
    const walk = (current: SyntaxNode): void => {
        for (const child of current.namedChildren) {
            if (COMMENT_TYPES.has(child.type)) continue;
            last = Math.max(last, startLine(child));
            if (!ATOMIC_TYPES.has(child.type)) walk(child);
        }
    };
    walk(node);
    return last;
}

function firstErrorNode(node: SyntaxNode): SyntaxNode | undefined {
    if (node.type === 'ERROR' || node.isMissing) {
        return node;
    }
    for (const child of node.children) {
        if (child.hasError || child.isMissing) {
            const found = firstErrorNode(child);
            if (found) return found;
        }
    }
    return undefined;
}

/**
 * Parses `sourceText` and rejects trees that contain ERROR or MISSING nodes,
 * pointing at the first one in document order.
 */
export function parseOrThrow(parser: Parser, sourceText: string): Parser.Tree {
    let tree: Parser.Tree;
    try {
        // The binding reads input in fixed-size chunks; size the buffer to the whole text.
        tree = parser.parse(sourceText, undefined, { bufferSize: Math.max(32 * 1024, sourceText.length * 2 + 1) });
    } catch (error: unknown) {
        throw new ParserError('Parser failed to process the source text', { originalError: error });
    }

    const root = tree.rootNode;
    if (!root.hasError) {
        return tree;
    }

    const errorNode = firstErrorNode(root) ?? root;
    const line = startLine(errorNode);
    const column = errorNode.startPosition.column + 1;
    if (errorNode.isMissing) {
        throw new ParserError(`Missing '${errorNode.type}' at line ${line}, column ${column}`, { line });
    }
    const snippet = getNodeText(errorNode).split('\n')[0].trim().slice(0, 40);
    const near = snippet ? ` near '${snippet}'` : '';
    throw new ParserError(`Invalid syntax at line ${line}, column ${column}${near}`, { line });
}

/**
 * Counts decision points below `root` without entering nested scopes.
 * `weigh` returns how many decision points a single node contributes.
 */
export function countDecisionPoints(
    root: SyntaxNode,
    weigh: (node: SyntaxNode) => number,
    isNestedScope: (node: SyntaxNode) => boolean,
): number {
    let count = 0;
    const walk = (node: SyntaxNode): void => {
        for (const child of node.namedChildren) {
            if (isNestedScope(child)) continue;
            count += weigh(child);
            walk(child);
        }
    };
    walk(root);
    return count;
}
