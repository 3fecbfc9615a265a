import { getConfigFromCli } from "./arg-parser.js";
import type { QcheckConfig } from "./types.js";

export type { QcheckConfig } from "./types.js";

let config: QcheckConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
