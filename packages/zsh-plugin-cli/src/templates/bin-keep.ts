// Keeps the otherwise empty `bin/` directory under version control.
export const BIN_KEEP_TEMPLATE = '';
