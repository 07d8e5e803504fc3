/**
 * `README.md`
 */

export const README_TEMPLATE = `# Zsh Plugin {{ plugin_display_name }}

{% if short_description %}
{{ short_description }}
{% else %}
Zsh plugin to do something...
{% endif %}

## Installation

Clone the repository and source the plugin from your \`.zshrc\`:

\`\`\`zsh
git clone https://github.com/{{ github_user }}/zsh-{{ plugin_name }}-plugin.git
source zsh-{{ plugin_name }}-plugin/{{ plugin_name }}.plugin.zsh
\`\`\`
{% if use_zplugins %}

This plugin uses the \`@zplugin_*\` helper functions, so load the
\`zplugins\` plugin before it.
{% endif %}

Or, with a plugin manager such as [antigen](https://github.com/zsh-users/antigen):

\`\`\`zsh
antigen bundle {{ github_user }}/zsh-{{ plugin_name }}-plugin
\`\`\`
{% if include_bash_wrapper %}

### Bash

The wrapper script lets Bash source the same plugin:

\`\`\`bash
source zsh-{{ plugin_name }}-plugin/{{ plugin_name }}.bash
\`\`\`
{% endif %}

## Usage

Set \`{{ plugin_var }}_EXAMPLE\` and call \`{{ plugin_name }}_example\`.

## Unloading

\`\`\`zsh
{{ plugin_name }}_plugin_unload
\`\`\`

This removes all functions{% if include_aliases %} and aliases{% endif %} the plugin defined and unsets \`{{ plugin_var }}\`.
`;
