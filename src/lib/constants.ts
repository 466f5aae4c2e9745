export const EOL = '\n';
export const DOUBLE_EOL = EOL + EOL;

/**
 * Prefix shared by every error class thrown from this package
 */
export const STACKCTL_ERR_PREFIX = 'StackctlErr';
