// src/analyzer/parsers/javascript-parser.ts
import { Node, Project, ScriptKind, SourceFile, SyntaxKind } from 'ts-morph';
import { createContextLogger } from '../../utils/logger.js';
import { ParserError } from '../../utils/errors.js';
import { getFunctionRecordName, isDeclarationName } from '../../utils/ts-helpers.js';
import { calculateCyclomaticComplexity } from '../analysis/complexity-analyzer.js';
import { SyntaxExtraction, SyntaxExtractor } from '../types.js';
import { ExtractionCollector } from './extraction-collector.js';

const logger = createContextLogger('JavaScriptParser');

const SOURCE_FILE_NAME = 'source.js';

function isLoop(node: Node): boolean {
    return Node.isForStatement(node)
        || Node.isForInStatement(node)
        || Node.isForOfStatement(node)
        || Node.isWhileStatement(node)
        || Node.isDoStatement(node);
}

/** `foo()` and `this.foo()` name a callee; `obj.foo()` and computed calls do not. */
function calleeName(node: Node): string | undefined {
    if (!Node.isCallExpression(node)) return undefined;
    const expression = node.getExpression();
    if (Node.isIdentifier(expression)) {
        return expression.getText();
    }
    if (Node.isPropertyAccessExpression(expression) && expression.getExpression().getKind() === SyntaxKind.ThisKeyword) {
        return expression.getName();
    }
    return undefined;
}

function isPlainAssignment(node: Node): boolean {
    return Node.isBinaryExpression(node) && node.getOperatorToken().getKind() === SyntaxKind.EqualsToken;
}

/** True when `identifier` is read: not a declaration name, not a property name, not the target of `=`. */
function isReadReference(identifier: Node): boolean {
    const parent = identifier.getParent();
    if (!parent) return true;
    if (Node.isPropertyAccessExpression(parent) && parent.getNameNode() === identifier) {
        return false;
    }
    if (Node.isBinaryExpression(parent) && isPlainAssignment(parent) && parent.getLeft() === identifier) {
        return false;
    }
    return !isDeclarationName(identifier);
}

class JavaScriptAstVisitor {
    private readonly collector = new ExtractionCollector('javascript', { tracksVariables: true, approximate: false });

    visit(node: Node): void {
        if (isLoop(node)) {
            this.collector.enterLoop(node.getStartLineNumber());
            node.forEachChild(child => this.visit(child));
            this.collector.exitLoop();
            return;
        }

        const functionName = getFunctionRecordName(node);
        if (functionName !== undefined) {
            this.collector.enterFunction(functionName, node.getStartLineNumber());
            node.forEachChild(child => this.visit(child));
            this.collector.exitFunction(node.getEndLineNumber(), calculateCyclomaticComplexity(node));
            return;
        }

        const callee = calleeName(node);
        if (callee !== undefined) {
            this.collector.recordCall(callee);
        } else if (Node.isVariableDeclaration(node)) {
            const nameNode = node.getNameNode();
            const initializer = node.getInitializer();
            // `const f = () => ...` declares a function, not a variable
            if (Node.isIdentifier(nameNode) && initializer && getFunctionRecordName(initializer) === undefined) {
                this.collector.recordAssignment(nameNode.getText());
            }
        } else if (Node.isBinaryExpression(node) && isPlainAssignment(node)) {
            const left = node.getLeft();
            if (Node.isIdentifier(left)) {
                this.collector.recordAssignment(left.getText());
            }
        } else if (Node.isIdentifier(node) && isReadReference(node)) {
            this.collector.recordRead(node.getText());
        }

        node.forEachChild(child => this.visit(child));
    }

    result(): SyntaxExtraction {
        return this.collector.build();
    }
}

export class JavaScriptParser implements SyntaxExtractor {
    readonly language = 'javascript' as const;

    extract(sourceText: string): SyntaxExtraction {
        const sourceFile = this.parse(sourceText);
        const visitor = new JavaScriptAstVisitor();
        visitor.visit(sourceFile);
        const extraction = visitor.result();
        logger.debug(`Extracted ${extraction.functions.length} functions and ${extraction.loops.length} loops`);
        return extraction;
    }

    private parse(sourceText: string): SourceFile {
        const project = new Project({
            useInMemoryFileSystem: true,
            compilerOptions: { allowJs: true, checkJs: false, noEmit: true },
        });
        const sourceFile = project.createSourceFile(SOURCE_FILE_NAME, sourceText, { scriptKind: ScriptKind.JS });

        const [first] = project.getProgram().getSyntacticDiagnostics(sourceFile);
        if (first) {
            const message = first.getMessageText();
            const text = typeof message === 'string' ? message : message.getMessageText();
            const line = first.getLineNumber();
            const location = line !== undefined ? ` at line ${line}` : '';
            throw new ParserError(`${text}${location}`, { line });
        }
        return sourceFile;
    }
}
