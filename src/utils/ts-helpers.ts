import { Node, SyntaxKind } from 'ts-morph';

/**
 * Name under which a function-like node is reported, or undefined when the
 * node is not reported as a function of its own (anonymous callbacks,
 * accessors, object-literal members).
 *
 * Declarations use their own name; function and arrow expressions take the
 * name of the variable they initialize.
 */
export function getFunctionRecordName(node: Node): string | undefined {
    if (Node.isFunctionDeclaration(node)) {
        return node.getName();
    }
    if (Node.isMethodDeclaration(node)) {
        return node.getName();
    }
    if (Node.isConstructorDeclaration(node)) {
        return 'constructor';
    }
    if (Node.isArrowFunction(node) || Node.isFunctionExpression(node)) {
        const parent = node.getParent();
        if (Node.isVariableDeclaration(parent) && Node.isIdentifier(parent.getNameNode())) {
            return parent.getName();
        }
    }
    return undefined;
}

/**
 * True when `identifier` is the name being declared by its parent
 * (variable, parameter, function, class, member, label) rather than a
 * reference to something declared elsewhere.
 */
export function isDeclarationName(identifier: Node): boolean {
    const parent = identifier.getParent();
    if (!parent) return false;

    if (
        Node.isVariableDeclaration(parent) ||
        Node.isParameterDeclaration(parent) ||
        Node.isFunctionDeclaration(parent) ||
        Node.isFunctionExpression(parent) ||
        Node.isClassDeclaration(parent) ||
        Node.isClassExpression(parent) ||
        Node.isMethodDeclaration(parent) ||
        Node.isPropertyDeclaration(parent) ||
        Node.isPropertyAssignment(parent) ||
        Node.isGetAccessorDeclaration(parent) ||
        Node.isSetAccessorDeclaration(parent)
    ) {
        return parent.getNameNode() === identifier;
    }
    if (Node.isBindingElement(parent)) {
        return parent.getNameNode() === identifier || parent.getPropertyNameNode() === identifier;
    }
    if (Node.isLabeledStatement(parent) || Node.isBreakStatement(parent) || Node.isContinueStatement(parent)) {
        return true;
    }
    return identifier.getFirstAncestorByKind(SyntaxKind.ImportDeclaration) !== undefined;
}
