// src/analyzer/parsers/java-parser.ts
import Parser from 'tree-sitter';
import Java from 'tree-sitter-java';
import { createContextLogger } from '../../utils/logger.js';
import { SyntaxExtraction, SyntaxExtractor } from '../types.js';
import { ExtractionCollector } from './extraction-collector.js';
import { SyntaxNode, countDecisionPoints, getNodeText, lastTokenLine, parseOrThrow, startLine } from './tree-sitter-utils.js';

const logger = createContextLogger('JavaParser');

const LOOP_NODES = new Set(['for_statement', 'enhanced_for_statement', 'while_statement', 'do_statement']);
const FUNCTION_NODES = new Set(['method_declaration', 'constructor_declaration']);
const TYPE_DECLARATIONS = new Set([
    'class_declaration',
    'interface_declaration',
    'enum_declaration',
    'record_declaration',
    'annotation_type_declaration',
]);
const SKIPPED_NODES = new Set([
    'package_declaration',
    'import_declaration',
    'line_comment',
    'block_comment',
    'marker_annotation',
    'annotation',
    'break_statement',
    'continue_statement',
]);

function hasOperator(node: SyntaxNode, operators: string[]): boolean {
    return node.children.some(child => operators.includes(child.type));
}

function decisionWeight(node: SyntaxNode): number {
    switch (node.type) {
        case 'if_statement':
        case 'for_statement':
        case 'enhanced_for_statement':
        case 'while_statement':
        case 'do_statement':
        case 'catch_clause':
        case 'ternary_expression':
            return 1;
        case 'switch_label':
            return node.text.trim().startsWith('default') ? 0 : 1;
        case 'binary_expression':
            return hasOperator(node, ['&&', '||']) ? 1 : 0;
        default:
            return 0;
    }
}

export function javaCyclomaticComplexity(functionNode: SyntaxNode): number {
    return 1 + countDecisionPoints(functionNode, decisionWeight, child => FUNCTION_NODES.has(child.type));
}

/** Simple name of a constructed type: `new Foo<T>()` and `new a.b.Foo()` both give `Foo`. */
function constructedTypeName(typeNode: SyntaxNode | null): string | undefined {
    if (!typeNode) return undefined;
    switch (typeNode.type) {
        case 'type_identifier':
            return typeNode.text;
        case 'generic_type':
        case 'scoped_type_identifier': {
            const parts = typeNode.namedChildren.filter(c => c.type === 'type_identifier' || c.type === 'scoped_type_identifier');
            return constructedTypeName(parts[parts.length - 1] ?? null);
        }
        default:
            return undefined;
    }
}

class JavaAstVisitor {
    private readonly collector = new ExtractionCollector('java', { tracksVariables: true, approximate: false });

    visit(node: SyntaxNode): void {
        if (SKIPPED_NODES.has(node.type)) return;

        if (FUNCTION_NODES.has(node.type)) {
            this.visitFunction(node);
            return;
        }
        if (LOOP_NODES.has(node.type)) {
            this.collector.enterLoop(startLine(node));
            this.visitExcept(node, ['name']); // enhanced for binds its variable in `name`
            this.collector.exitLoop();
            return;
        }
        if (TYPE_DECLARATIONS.has(node.type)) {
            this.visitExcept(node, ['name']);
            return;
        }

        switch (node.type) {
            case 'identifier':
                this.collector.recordRead(node.text);
                return;
            case 'variable_declarator':
            case 'resource':
                this.visitDeclarator(node);
                return;
            case 'assignment_expression':
                this.visitAssignment(node);
                return;
            case 'method_invocation':
                this.visitMethodInvocation(node);
                return;
            case 'object_creation_expression': {
                const typeName = constructedTypeName(node.childForFieldName('type'));
                if (typeName) this.collector.recordCall(typeName);
                this.visitExcept(node, ['type']);
                return;
            }
            case 'lambda_expression':
                this.visitField(node, 'body');
                return;
            case 'catch_clause':
                this.visitField(node, 'body');
                return;
            case 'instanceof_expression':
            case 'enum_constant':
                this.visitExcept(node, ['name']);
                return;
            case 'labeled_statement':
                for (const child of node.namedChildren) {
                    if (child.type !== 'identifier') this.visit(child);
                }
                return;
            default:
                this.visitChildren(node);
        }
    }

    result(): SyntaxExtraction {
        return this.collector.build();
    }

    private visitChildren(node: SyntaxNode): void {
        for (const child of node.namedChildren) {
            this.visit(child);
        }
    }

    private visitField(node: SyntaxNode, field: string): void {
        const child = node.childForFieldName(field);
        if (child) this.visit(child);
    }

    private visitExcept(node: SyntaxNode, fields: string[]): void {
        const skipped = fields
            .map(field => node.childForFieldName(field))
            .filter((child): child is SyntaxNode => child !== null);
        for (const child of node.namedChildren) {
            if (skipped.some(s => s.id === child.id)) continue;
            this.visit(child);
        }
    }

    private visitFunction(node: SyntaxNode): void {
        const name = getNodeText(node.childForFieldName('name'));
        this.collector.enterFunction(name, startLine(node));
        // Parameters only bind names; only the body can read or call.
        this.visitField(node, 'body');
        this.collector.exitFunction(lastTokenLine(node), javaCyclomaticComplexity(node));
    }

    private visitDeclarator(node: SyntaxNode): void {
        const name = node.childForFieldName('name');
        const value = node.childForFieldName('value');
        if (!name) {
            // try (existingResource) { ... }
            this.visitChildren(node);
            return;
        }
        if (name.type === 'identifier' && value) {
            this.collector.recordAssignment(name.text);
        }
        if (value) this.visit(value);
    }

    private visitAssignment(node: SyntaxNode): void {
        const left = node.childForFieldName('left');
        if (left?.type === 'identifier') {
            if (hasOperator(node, ['='])) {
                this.collector.recordAssignment(left.text);
            }
        } else if (left) {
            this.visit(left); // obj.field = ... and arr[i] = ... read their object and index
        }
        this.visitField(node, 'right');
    }

    private visitMethodInvocation(node: SyntaxNode): void {
        const object = node.childForFieldName('object');
        const name = node.childForFieldName('name');
        if (name && (!object || object.type === 'this')) {
            this.collector.recordCall(name.text);
        }
        if (object) this.visit(object);
        this.visitField(node, 'arguments');
    }
}

export class JavaParser implements SyntaxExtractor {
    readonly language = 'java' as const;
    private readonly parser: Parser;

    constructor() {
        this.parser = new Parser();
        this.parser.setLanguage(Java);
    }

    extract(sourceText: string): SyntaxExtraction {
        const tree = parseOrThrow(this.parser, sourceText);
        const visitor = new JavaAstVisitor();
        visitor.visit(tree.rootNode);
        const extraction = visitor.result();
        logger.debug(`Extracted ${extraction.functions.length} methods and ${extraction.loops.length} loops`);
        return extraction;
    }
}
