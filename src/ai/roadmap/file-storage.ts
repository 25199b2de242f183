import { mkdir, writeFile } from "fs/promises";
import * as path from "path";
import { createLogger } from "#roadmap/util/logging.js";

const log = createLogger("file-storage");

const MAX_SLUG_LENGTH = 50;

/**
 * Lower-cases the topic and reduces it to [a-z0-9_] for use in a file name.
 */
export function safeTopicSlug(topic: string): string {
  const slug = topic
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "")
    .slice(0, MAX_SLUG_LENGTH)
    .replace(/_+$/, "");
  return slug || "roadmap";
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as yyyymmdd_hhmmss. */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function roadmapFileName(topic: string, date: Date, limited = false): string {
  const suffix = limited ? "_LIMITED" : "";
  return `roadmap_${safeTopicSlug(topic)}_${formatTimestamp(date)}${suffix}.txt`;
}

export interface SaveRoadmapOptions {
  outputDir: string;
  limited: boolean;
  /** Additional path that receives a copy of the document. */
  extraPath?: string;
  date?: Date;
}

/**
 * Writes the roadmap document and returns every path written. A limited run
 * also gets a copy whose name ends in _LIMITED.
 */
export async function saveRoadmap(
  topic: string,
  document: string,
  { outputDir, limited, extraPath, date = new Date() }: SaveRoadmapOptions
): Promise<string[]> {
  await mkdir(outputDir, { recursive: true });

  const targets = [path.join(outputDir, roadmapFileName(topic, date))];
  if (limited) {
    targets.push(path.join(outputDir, roadmapFileName(topic, date, true)));
  }
  if (extraPath) {
    targets.push(extraPath);
  }

  for (const target of targets) {
    await writeFile(target, document, "utf-8");
    log.info(`Saved ${target}`);
  }
  return targets;
}
