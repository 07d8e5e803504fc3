/**
 * `.gitignore`
 */

export const GITIGNORE_TEMPLATE = `# Editor and OS files
*~
\\#*\\#
.\\#*
*.swp
.DS_Store
{% if include_shell_spec %}

# ShellSpec
/coverage/
/report/
.shellspec-local
.shellspec-quick.log
{% endif %}
`;
