import { SessionIndex } from "./sessionIndex.js";

/** Builds an index from the config file and waits for its first full refresh to settle. */
export async function loadIndex(configPath?: string): Promise<SessionIndex> {
  const index = await SessionIndex.fromConfigPath(configPath);
  await index.start();
  await index.whenIdle();
  return index;
}
