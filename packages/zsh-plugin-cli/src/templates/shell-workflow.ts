/**
 * `.github/workflows/shell.yml`, runs the Makefile targets on push
 */

export const SHELL_WORKFLOW_TEMPLATE = `name: Shell

on:
  push:
    branches: [ "main" ]
  pull_request:
    branches: [ "main" ]

jobs:
{% if include_shell_check %}
  lint:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4
      - name: Install ShellCheck
        run: sudo apt-get install -y shellcheck
      - name: Lint
        run: make lint
{% endif %}
{% if include_shell_spec %}
  test:
    runs-on: ubuntu-latest
    steps:
      - uses: actions/checkout@v4
      - name: Install Zsh and ShellSpec
        run: |
          sudo apt-get install -y zsh
          curl -fsSL https://git.io/shellspec | sh -s -- --yes
      - name: Test
        run: make test
{% endif %}
`;
