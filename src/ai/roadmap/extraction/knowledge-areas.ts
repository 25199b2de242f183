import { KnowledgeArea, KnowledgeAreaSchema } from "../schemas.js";

const AREA_PATTERN = /^[-•*]\s*\[(introductory|core|advanced)\]\s*(.+)$/i;

/**
 * Parses "- [tier] Area name" bullets. Duplicate names keep the first tier.
 */
export function parseKnowledgeAreas(text: string): KnowledgeArea[] {
  const areas: KnowledgeArea[] = [];
  const seen = new Set<string>();

  for (const rawLine of text.split("\n")) {
    const match = AREA_PATTERN.exec(rawLine.trim());
    if (!match) continue;

    const parsed = KnowledgeAreaSchema.safeParse({
      name: match[2].trim(),
      tier: match[1].toLowerCase(),
    });
    if (!parsed.success) continue;

    const key = parsed.data.name.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    areas.push(parsed.data);
  }

  return areas;
}
