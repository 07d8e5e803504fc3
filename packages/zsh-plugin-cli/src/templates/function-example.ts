/**
 * `functions/<name>_example`, an autoloaded function body
 */

export const FUNCTION_EXAMPLE_TEMPLATE = `# -*- mode: sh; eval: (sh-set-shell "zsh") -*-
#
# Example autoload function for {{ plugin_display_name }}.
#
# Functions in this directory are autoloaded by \`{{ plugin_name }}_plugin_init\`
# and removed again by \`{{ plugin_name }}_plugin_unload\`.
#

builtin emulate -L zsh

printf 'An example function in {{ plugin_name }}, var: %s\\n' "\${{{ plugin_var }}_EXAMPLE}"
`;
