/**
 * Template Parser
 *
 * Builds a node tree from lexer tokens.
 */

import { TemplateError } from '../../utils/error-handler.js';
import { tokenize } from './lexer.js';
import { isIdentifier, parseExpression, type Expression } from './expression.js';

export interface ConditionalBranch {
  condition: Expression;
  line: number;
  body: TemplateNode[];
}

export type TemplateNode =
  | { type: 'text'; value: string }
  | { type: 'output'; name: string; line: number }
  | { type: 'if'; branches: ConditionalBranch[]; otherwise: TemplateNode[] };

interface OpenConditional {
  node: Extract<TemplateNode, { type: 'if' }>;
  body: TemplateNode[];
  hasElse: boolean;
  line: number;
}

export function compileTemplate(source: string, templateName: string): TemplateNode[] {
  const root: TemplateNode[] = [];
  const stack: OpenConditional[] = [];
  const currentBody = (): TemplateNode[] => stack[stack.length - 1]?.body ?? root;

  for (const token of tokenize(source, templateName)) {
    if (token.type === 'text') {
      currentBody().push({ type: 'text', value: token.value });
      continue;
    }

    if (token.type === 'output') {
      if (!isIdentifier(token.expression)) {
        throw new TemplateError(
          `Invalid substitution '{{ ${token.expression} }}'`,
          templateName,
          token.line
        );
      }
      currentBody().push({ type: 'output', name: token.expression, line: token.line });
      continue;
    }

    const [keyword = '', ...rest] = token.expression.split(/\s+/);
    const argument = rest.join(' ');
    const open = stack[stack.length - 1];

    if ((keyword === 'else' || keyword === 'endif') && argument.length > 0) {
      throw new TemplateError(`'${keyword}' takes no arguments`, templateName, token.line);
    }

    switch (keyword) {
      case 'if': {
        const branch: ConditionalBranch = {
          condition: parseExpression(argument, templateName, token.line),
          line: token.line,
          body: [],
        };
        const node: OpenConditional['node'] = { type: 'if', branches: [branch], otherwise: [] };
        currentBody().push(node);
        stack.push({ node, body: branch.body, hasElse: false, line: token.line });
        break;
      }
      case 'elif': {
        if (!open || open.hasElse) {
          throw new TemplateError("'elif' without a matching 'if'", templateName, token.line);
        }
        const branch: ConditionalBranch = {
          condition: parseExpression(argument, templateName, token.line),
          line: token.line,
          body: [],
        };
        open.node.branches.push(branch);
        open.body = branch.body;
        break;
      }
      case 'else': {
        if (!open || open.hasElse) {
          throw new TemplateError("'else' without a matching 'if'", templateName, token.line);
        }
        open.hasElse = true;
        open.body = open.node.otherwise;
        break;
      }
      case 'endif': {
        if (!open) {
          throw new TemplateError("'endif' without a matching 'if'", templateName, token.line);
        }
        stack.pop();
        break;
      }
      default:
        throw new TemplateError(`Unknown block tag '${keyword}'`, templateName, token.line);
    }
  }

  const unclosed = stack.pop();
  if (unclosed) {
    throw new TemplateError("Unclosed 'if' block", templateName, unclosed.line);
  }

  return root;
}

function collectExpressionReferences(
  expression: Expression,
  line: number,
  references: Map<string, number>
): void {
  switch (expression.type) {
    case 'variable':
      if (!references.has(expression.name)) references.set(expression.name, line);
      break;
    case 'not':
      collectExpressionReferences(expression.operand, line, references);
      break;
    case 'and':
    case 'or':
      collectExpressionReferences(expression.left, line, references);
      collectExpressionReferences(expression.right, line, references);
      break;
  }
}

/**
 * Every context key a template can reach, mapped to the line it first appears on
 */
export function collectReferences(
  nodes: TemplateNode[],
  references: Map<string, number> = new Map()
): Map<string, number> {
  for (const node of nodes) {
    if (node.type === 'output') {
      if (!references.has(node.name)) references.set(node.name, node.line);
    } else if (node.type === 'if') {
      for (const branch of node.branches) {
        collectExpressionReferences(branch.condition, branch.line, references);
        collectReferences(branch.body, references);
      }
      collectReferences(node.otherwise, references);
    }
  }

  return references;
}
