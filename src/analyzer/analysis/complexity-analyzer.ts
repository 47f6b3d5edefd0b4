import { Node, ts } from 'ts-morph';
import { getFunctionRecordName } from '../../utils/ts-helpers.js';

const { SyntaxKind: SK } = ts; // Alias for brevity

const DECISION_KINDS = new Set<ts.SyntaxKind>([
    SK.IfStatement,
    SK.ForStatement,
    SK.ForInStatement,
    SK.ForOfStatement,
    SK.WhileStatement,
    SK.DoStatement,
    SK.CaseClause,
    SK.CatchClause,
    SK.ConditionalExpression, // Ternary '?'
]);

const LOGICAL_OPERATORS = new Set<ts.SyntaxKind>([
    SK.AmpersandAmpersandToken, // &&
    SK.BarBarToken,             // ||
    SK.QuestionQuestionToken,   // ??
]);

/**
 * Calculates the cyclomatic complexity of a function-like node.
 * Complexity = Decision Points + 1
 * Decision Points include: if, for, while, case, &&, ||, ?, ??, catch clauses.
 *
 * Functions nested inside `node` that are reported on their own (named
 * declarations, methods, variable-initialized function expressions) are not
 * counted; anonymous callbacks are.
 */
export function calculateCyclomaticComplexity(node: Node | undefined): number {
    if (!node) {
        return 1;
    }

    let complexity = 1;

    node.forEachDescendant((descendant, traversal) => {
        if (getFunctionRecordName(descendant) !== undefined) {
            traversal.skip();
            return;
        }

        if (DECISION_KINDS.has(descendant.getKind())) {
            complexity++;
        } else if (Node.isBinaryExpression(descendant)) {
            if (LOGICAL_OPERATORS.has(descendant.getOperatorToken().getKind())) {
                complexity++;
            }
        }
    });

    return complexity;
}
