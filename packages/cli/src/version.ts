/**
 * Package version, shared by the program and the reporter header
 */
export const VERSION = '0.1.0';
