import type { AppConfig } from "@sessiondex/contracts";
import type { Logger } from "../logger.js";
import type { RecordCache } from "../recordCache.js";
import { FileSessionProvider } from "./fileProvider.js";
import type { SessionProvider } from "./types.js";

export function createDefaultProviders(config: AppConfig, cache: RecordCache, logger?: Logger): SessionProvider[] {
  return Object.values(config.sources)
    .filter((profile) => profile.enabled && profile.roots.length > 0)
    .map((profile) => new FileSessionProvider(logger ? { profile, cache, logger } : { profile, cache }));
}
