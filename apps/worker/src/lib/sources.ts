import { readFileSync } from "node:fs";
import { z } from "zod";

import type { FeedSource } from "./articles.js";

const sourcesFileSchema = z.object({
  sources: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        url: z.string().url(),
        trustBonus: z.number().int().optional()
      })
    )
    .min(1)
});

const DEFAULT_SOURCES_URL = new URL("../../config/sources.json", import.meta.url);

export function loadSources(path: URL | string = DEFAULT_SOURCES_URL): FeedSource[] {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return sourcesFileSchema.parse(raw).sources;
}

/** Looks up a source's trust bonus by name; unknown sources get 0. */
export function trustBonusLookup(sources: readonly FeedSource[]) {
  const bonuses = new Map(
    sources.map((source) => [source.name, source.trustBonus ?? 0])
  );
  return (name: string) => bonuses.get(name) ?? 0;
}
