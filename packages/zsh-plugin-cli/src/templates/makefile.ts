/**
 * `Makefile` with lint and test targets; recipe lines must start with a tab.
 */

export const MAKEFILE_TEMPLATE = `SHELL := /bin/bash

SOURCES := {{ plugin_name }}.plugin.zsh{% if include_bash_wrapper %} {{ plugin_name }}.bash{% endif %}{% if include_functions_dir %} $(wildcard functions/*){% endif %}

.PHONY: all
all:{% if include_shell_check %} lint{% endif %}{% if include_shell_spec %} test{% endif %}
{% if include_shell_check %}

.PHONY: lint
lint:
\tshellcheck --shell=bash $(SOURCES)
{% endif %}
{% if include_shell_spec %}

.PHONY: test
test:
\tshellspec --shell zsh
{% endif %}
`;
