/**
 * Version marker embedded in description sets produced by this release.
 * Loaded snapshots are compared against it to warn about version skew.
 */
export const REPORT_KIT_VERSION = '0.1.0';
