/** Must match the `version` in packages/cli/package.json. */
export const VERSION = "0.1.0";
