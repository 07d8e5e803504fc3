/**
 * Embedded template registry
 */

import type { TemplateId } from '../types/template.js';
import { BASH_WRAPPER_TEMPLATE } from './bash-wrapper.js';
import { BIN_KEEP_TEMPLATE } from './bin-keep.js';
import { FUNCTION_EXAMPLE_TEMPLATE } from './function-example.js';
import { GITIGNORE_TEMPLATE } from './gitignore.js';
import { MAKEFILE_TEMPLATE } from './makefile.js';
import { PLUGIN_SOURCE_TEMPLATE } from './plugin-source.js';
import { PLUGIN_SOURCE_ZPLUGINS_TEMPLATE } from './plugin-source-zplugins.js';
import { README_TEMPLATE } from './readme.js';
import { SHELL_WORKFLOW_TEMPLATE } from './shell-workflow.js';

export const TEMPLATES: Readonly<Record<TemplateId, string>> = Object.freeze({
  'plugin-source': PLUGIN_SOURCE_TEMPLATE,
  'plugin-source-zplugins': PLUGIN_SOURCE_ZPLUGINS_TEMPLATE,
  'bash-wrapper': BASH_WRAPPER_TEMPLATE,
  'function-example': FUNCTION_EXAMPLE_TEMPLATE,
  'bin-keep': BIN_KEEP_TEMPLATE,
  makefile: MAKEFILE_TEMPLATE,
  gitignore: GITIGNORE_TEMPLATE,
  'shell-workflow': SHELL_WORKFLOW_TEMPLATE,
  readme: README_TEMPLATE,
});
