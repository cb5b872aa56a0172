// Copyright (c) Microsoft Corporation.
// Licensed under the MIT license.

import createDebug from "debug";

// Output is enabled per level through the DEBUG environment variable,
// e.g. DEBUG=circuit-text:* or DEBUG=circuit-text:warn
const namespace = "circuit-text";

const debugLog = createDebug(`${namespace}:debug`);
const warnLog = createDebug(`${namespace}:warn`);

export const log = {
  debug(...args: unknown[]): void {
    debugLog("%s", args.map(_format).join(" "));
  },
  warn(...args: unknown[]): void {
    warnLog("%s", args.map(_format).join(" "));
  },
};

const _format = (arg: unknown): string => {
  if (typeof arg === "string") return arg;
  if (arg instanceof Error) return arg.stack ?? arg.message;
  return JSON.stringify(arg);
};
