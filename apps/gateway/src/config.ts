import { loadConfig, type Config } from "@notifygate/config";

export const config = loadConfig();
export type { Config };
