// Replaced by tsup with the package.json version when bundling
declare const __VERSION__: string;

export const version = typeof __VERSION__ !== "undefined" ? __VERSION__ : "0.0.0-dev";
