/**
 * Template Renderer
 *
 * Renders the embedded templates against a template context. Substitution is
 * raw text insertion: the output is shell source, so nothing is escaped.
 */

import { TemplateError } from '../../utils/error-handler.js';
import { TEMPLATES } from '../../templates/index.js';
import type { TemplateId, TemplateValue, TemplateValues } from '../../types/template.js';
import { collectReferences, compileTemplate, type TemplateNode } from './parser.js';
import type { Expression } from './expression.js';

interface CompiledTemplate {
  nodes: TemplateNode[];
  references: Map<string, number>;
}

function compile(source: string, name: string): CompiledTemplate {
  const nodes = compileTemplate(source, name);
  return { nodes, references: collectReferences(nodes) };
}

export class TemplateRenderer {
  private readonly compiled = new Map<TemplateId, CompiledTemplate>();

  constructor(private readonly templates: Readonly<Record<TemplateId, string>> = TEMPLATES) {}

  /**
   * Render one of the bundled templates
   */
  render(id: TemplateId, context: TemplateValues): string {
    let template = this.compiled.get(id);
    if (!template) {
      template = compile(this.templates[id], id);
      this.compiled.set(id, template);
    }

    return this.evaluate(template, context, id);
  }

  /**
   * Render ad-hoc template source
   */
  renderString(source: string, context: TemplateValues, name: string = 'inline'): string {
    return this.evaluate(compile(source, name), context, name);
  }

  /**
   * Keys are checked up front so a key missing from an untaken branch still fails.
   */
  private evaluate(template: CompiledTemplate, context: TemplateValues, name: string): string {
    for (const [key, line] of template.references) {
      this.lookup(key, context, name, line);
    }

    return this.evaluateNodes(template.nodes, context, name);
  }

  private evaluateNodes(nodes: TemplateNode[], context: TemplateValues, name: string): string {
    let output = '';

    for (const node of nodes) {
      switch (node.type) {
        case 'text':
          output += node.value;
          break;
        case 'output':
          output += String(this.lookup(node.name, context, name, node.line));
          break;
        case 'if': {
          const branch = node.branches.find((candidate) =>
            this.evaluateCondition(candidate.condition, context, name, candidate.line)
          );
          output += this.evaluateNodes(branch ? branch.body : node.otherwise, context, name);
          break;
        }
      }
    }

    return output;
  }

  private evaluateCondition(
    expression: Expression,
    context: TemplateValues,
    name: string,
    line: number
  ): boolean {
    switch (expression.type) {
      case 'literal':
        return expression.value;
      case 'variable': {
        const value = this.lookup(expression.name, context, name, line);
        return typeof value === 'boolean' ? value : value.length > 0;
      }
      case 'not':
        return !this.evaluateCondition(expression.operand, context, name, line);
      case 'and':
      case 'or': {
        const left = this.evaluateCondition(expression.left, context, name, line);
        const right = this.evaluateCondition(expression.right, context, name, line);
        return expression.type === 'and' ? left && right : left || right;
      }
    }
  }

  private lookup(key: string, context: TemplateValues, name: string, line: number): TemplateValue {
    if (!Object.hasOwn(context, key)) {
      throw new TemplateError(`Unknown template variable '${key}'`, name, line);
    }

    return context[key];
  }
}

/**
 * Shared renderer over the bundled templates
 */
export const templateRenderer = new TemplateRenderer();
