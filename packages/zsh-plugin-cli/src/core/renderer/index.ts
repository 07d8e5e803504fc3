export { TemplateRenderer, templateRenderer } from './template-renderer.js';
export {
  collectReferences,
  compileTemplate,
  type TemplateNode,
  type ConditionalBranch,
} from './parser.js';
export { parseExpression, type Expression } from './expression.js';
