import { getConfigFromCli } from "./arg-parser.js";
import type { ApirefConfig } from "./types.js";

let config: ApirefConfig | undefined = undefined;

export const getConfig = () => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};

export type { ApirefConfig } from "./types.js";
