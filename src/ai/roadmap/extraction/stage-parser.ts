/**
 * Stage extraction from a generated plan.
 *
 * Only lines of the form "Stage <1-7>: <title>" or "Phase <1-7>: <title>"
 * open a stage. Field lines that follow ("Description:", "Duration:",
 * "Prerequisites:") and bullet lines (objectives) attach to the open stage;
 * anything before the first header is ignored.
 */

import type { StageInfo } from "../schemas.js";

const STAGE_HEADER = /^(?:#+\s*)?(?:\*\*)?(?:Stage|Phase)\s+([1-7]):\s*(.+?)\**$/i;
const FIELD_LINE = /^(?:\*\*)?(description|duration|time|prerequisites?|objectives?|goals?)(?:\*\*)?\s*:\s*(.*)$/i;
const BULLET_LINE = /^(?:[-•*]|\d+[.)])\s+(.+)$/;

export const DEFAULT_STAGE_DURATION = "4 weeks";

function parsePrerequisites(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0 && item.toLowerCase() !== "none");
}

/**
 * Returns the stages in document order with duplicates (by name) removed.
 * The result may be empty; callers decide on a fallback.
 */
export function parseStages(text: string): StageInfo[] {
  const stages: StageInfo[] = [];
  let current: StageInfo | undefined;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    const header = STAGE_HEADER.exec(line);
    if (header) {
      const name = header[2].trim();
      if (stages.some((stage) => stage.name === name)) {
        current = undefined;
        continue;
      }
      current = {
        name,
        description: "",
        duration: DEFAULT_STAGE_DURATION,
        prerequisites: [],
        objectives: [],
        covered: false,
      };
      stages.push(current);
      continue;
    }

    if (!current) continue;

    const field = FIELD_LINE.exec(line);
    if (field) {
      const label = field[1].toLowerCase();
      const value = field[2].trim();
      if (label === "description") {
        current.description = value;
      } else if (label === "duration" || label === "time") {
        current.duration = value || DEFAULT_STAGE_DURATION;
      } else if (label.startsWith("prerequisite")) {
        current.prerequisites = parsePrerequisites(value);
      }
      continue;
    }

    const bullet = BULLET_LINE.exec(line);
    if (bullet) {
      current.objectives.push(bullet[1].trim());
    } else if (!current.description) {
      current.description = line;
    }
  }

  return stages;
}
