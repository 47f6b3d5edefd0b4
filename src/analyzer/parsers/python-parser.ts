// src/analyzer/parsers/python-parser.ts
import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';
import { createContextLogger } from '../../utils/logger.js';
import { SyntaxExtraction, SyntaxExtractor } from '../types.js';
import { ExtractionCollector } from './extraction-collector.js';
import { SyntaxNode, countDecisionPoints, getNodeText, lastDescendantStartLine, parseOrThrow, startLine } from './tree-sitter-utils.js';

const logger = createContextLogger('PythonParser');

/** Whether identifiers met while walking are being read or bound. */
type ReferenceMode = 'load' | 'store';

const DECISION_NODES = new Set([
    'if_statement',
    'elif_clause',
    'for_statement',
    'while_statement',
    'except_clause',
    'except_group_clause',
    'conditional_expression',
    'boolean_operator',
    'for_in_clause',
    'if_clause',
    'assert_statement',
    'case_clause',
]);

// Statements whose identifiers are module paths or scope declarations, not variable reads.
const SKIPPED_STATEMENTS = new Set([
    'import_statement',
    'import_from_statement',
    'future_import_statement',
    'global_statement',
    'nonlocal_statement',
    'comment',
]);

function isNestedScope(node: SyntaxNode): boolean {
    return node.type === 'function_definition' || node.type === 'class_definition';
}

function decisionWeight(node: SyntaxNode): number {
    if (!DECISION_NODES.has(node.type)) {
        // try ... else
        return node.type === 'try_statement' && node.namedChildren.some(c => c.type === 'else_clause') ? 1 : 0;
    }
    // for ... else / while ... else
    if ((node.type === 'for_statement' || node.type === 'while_statement') && node.childForFieldName('alternative')) {
        return 2;
    }
    return 1;
}

/** Cyclomatic complexity of one function body; nested functions and classes are scored on their own. */
export function pythonCyclomaticComplexity(functionNode: SyntaxNode): number {
    return 1 + countDecisionPoints(functionNode, decisionWeight, isNestedScope);
}

/**
 * Walks a tree-sitter-python tree top-down, tracking whether each identifier
 * is read or bound. Only a bare name on the left of `=` counts as an
 * assignment; only a bare name in call position counts as a call.
 */
class PythonAstVisitor {
    private readonly collector = new ExtractionCollector('python', { tracksVariables: true, approximate: false });

    visit(node: SyntaxNode): void {
        this.visitNode(node, 'load');
    }

    result(): SyntaxExtraction {
        return this.collector.build();
    }

    private visitNode(node: SyntaxNode, mode: ReferenceMode): void {
        if (SKIPPED_STATEMENTS.has(node.type)) return;

        switch (node.type) {
            case 'identifier':
                if (mode === 'load') this.collector.recordRead(node.text);
                return;
            case 'function_definition':
                this.visitFunction(node);
                return;
            case 'class_definition':
                this.visitExcept(node, ['name'], 'load');
                return;
            case 'lambda':
                this.visitParameters(node.childForFieldName('parameters'));
                this.visitField(node, 'body', 'load');
                return;
            case 'for_statement':
            case 'while_statement':
                this.visitLoop(node);
                return;
            case 'assignment':
                this.visitAssignment(node);
                return;
            case 'augmented_assignment':
                this.visitField(node, 'left', 'store');
                this.visitField(node, 'right', 'load');
                return;
            case 'for_in_clause':
                this.visitField(node, 'left', 'store');
                this.visitExcept(node, ['left'], 'load');
                return;
            case 'named_expression':
                this.visitField(node, 'value', 'load');
                return;
            case 'keyword_argument':
                this.visitField(node, 'value', 'load');
                return;
            case 'attribute':
                this.visitField(node, 'object', 'load');
                return;
            case 'subscript':
                this.visitChildren(node, 'load');
                return;
            case 'call':
                this.visitCall(node);
                return;
            case 'as_pattern_target':
            case 'delete_statement':
                this.visitChildren(node, 'store');
                return;
            default:
                this.visitChildren(node, mode);
        }
    }

    private visitChildren(node: SyntaxNode, mode: ReferenceMode): void {
        for (const child of node.namedChildren) {
            this.visitNode(child, mode);
        }
    }

    private visitField(node: SyntaxNode, field: string, mode: ReferenceMode): void {
        const child = node.childForFieldName(field);
        if (child) this.visitNode(child, mode);
    }

    /** Visits every named child except the nodes held in the given fields. */
    private visitExcept(node: SyntaxNode, fields: string[], mode: ReferenceMode): void {
        const skipped = fields
            .map(field => node.childForFieldName(field))
            .filter((child): child is SyntaxNode => child !== null);
        for (const child of node.namedChildren) {
            if (skipped.some(s => s.id === child.id)) continue;
            this.visitNode(child, mode);
        }
    }

    private visitFunction(node: SyntaxNode): void {
        const name = getNodeText(node.childForFieldName('name'));
        this.collector.enterFunction(name, startLine(node));
        this.visitParameters(node.childForFieldName('parameters'));
        this.visitField(node, 'return_type', 'load');
        this.visitField(node, 'body', 'load');
        this.collector.exitFunction(lastDescendantStartLine(node), pythonCyclomaticComplexity(node));
    }

    private visitParameters(parameters: SyntaxNode | null): void {
        if (!parameters) return;
        for (const param of parameters.namedChildren) {
            switch (param.type) {
                case 'typed_parameter':
                    this.visitField(param, 'type', 'load');
                    break;
                case 'default_parameter':
                case 'typed_default_parameter':
                    this.visitField(param, 'type', 'load');
                    this.visitField(param, 'value', 'load');
                    break;
                default:
                    // bare names, *args, **kwargs and separators bind without reading
                    break;
            }
        }
    }

    private visitLoop(node: SyntaxNode): void {
        this.collector.enterLoop(startLine(node));
        if (node.type === 'for_statement') {
            this.visitField(node, 'left', 'store');
            this.visitExcept(node, ['left'], 'load');
        } else {
            this.visitChildren(node, 'load');
        }
        this.collector.exitLoop();
    }

    private visitAssignment(node: SyntaxNode): void {
        const left = node.childForFieldName('left');
        if (left) {
            if (left.type === 'identifier') {
                this.collector.recordAssignment(left.text);
            }
            this.visitNode(left, 'store');
        }
        this.visitField(node, 'type', 'load');
        // `a = b = 1` nests the second assignment in `right`
        this.visitField(node, 'right', 'load');
    }

    private visitCall(node: SyntaxNode): void {
        const callee = node.childForFieldName('function');
        if (callee?.type === 'identifier') {
            this.collector.recordCall(callee.text);
        }
        this.visitChildren(node, 'load');
    }
}

export class PythonParser implements SyntaxExtractor {
    readonly language = 'python' as const;
    private readonly parser: Parser;

    constructor() {
        this.parser = new Parser();
        this.parser.setLanguage(Python);
    }

    extract(sourceText: string): SyntaxExtraction {
        const tree = parseOrThrow(this.parser, sourceText);
        const visitor = new PythonAstVisitor();
        visitor.visit(tree.rootNode);
        const extraction = visitor.result();
        logger.debug(`Extracted ${extraction.functions.length} functions and ${extraction.loops.length} loops`);
        return extraction;
    }
}
