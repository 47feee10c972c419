/**
 * Package version, reported by `vertex-md --version`
 */
export const version = '0.1.0';
