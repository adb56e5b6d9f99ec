import { CODEGEN_ENV, parseFlag } from "../config/index.js";

let traceEnabled = parseFlag(process.env[CODEGEN_ENV.trace]) ?? false;

export const isTraceEnabled = (): boolean => traceEnabled;

export const setTraceEnabled = (enabled: boolean): void => {
  traceEnabled = enabled;
};

export const trace = (
  scope: string,
  message: string,
  details?: Readonly<Record<string, unknown>>
): void => {
  if (!traceEnabled) {
    return;
  }
  const suffix = details ? ` ${JSON.stringify(details)}` : "";
  console.error(`[serializer-codegen:${scope}] ${message}${suffix}`);
};
