/**
 * Prompt Formatter
 *
 * Turns a ranked entity list into the context block injected into the
 * system prompt. Entities are split into primary and related, then laid
 * out by the formatter the query scope picked:
 *
 * - detailed: primary / related lists plus known areas
 * - grouped_by_area: one block per area, [P] / [R] markers
 * - tldr: detailed plus a one-line per-area count
 * - compact: a single " | "-separated line
 *
 * Every format except compact ends with a "Relevant entities:" line, which
 * the conversation analyzer reads back on the next turn.
 */

import type { ConversationContext } from '@/core/conversation/types';
import type { EntityCandidate } from '@/core/entities/types';
import type { EntityScore } from '@/core/ranking/types';
import type { PromptFormat } from '@/core/scope/types';

export const PROMPT_HEADER = 'You are a Home Assistant agent.\n';
export const ENTITY_LIST_PREFIX = 'Relevant entities:';

export interface CategorizeOptions {
  maxPrimary?: number;
  maxRelated?: number;
}

export interface CategorizedEntities {
  primary: EntityScore[];
  related: EntityScore[];
}

/** Friendly names too generic to show on their own */
const GENERIC_NAMES = new Set(['temperature', 'humidity', 'pressure', 'power']);

/** Display label by sensor keyword, checked against device class and id */
const SENSOR_LABELS: ReadonlyArray<[string, string]> = [
  ['temperature', 'Hőmérséklet'],
  ['humidity', 'Páratartalom'],
  ['pressure', 'Légnyomás'],
  ['motion', 'Mozgás'],
  ['door', 'Ajtó'],
  ['window', 'Ablak'],
  ['power', 'Fogyasztás']
];

const DOMAIN_LABELS: Readonly<Record<string, string>> = {
  light: 'Világítás',
  switch: 'Kapcsoló',
  climate: 'Klíma'
};

// ═══════════════════════════════════════════════════════════════════════════════
// Categorization
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Split ranked entities into primary and related.
 *
 * The first entity with a non-trivial score is primary. Later ones become
 * primary when they match a mentioned area (with a matching device class or
 * a high score), or score high while adding a device class not seen among
 * the primaries yet. Everything else is related, up to maxRelated.
 */
export function categorizeEntities(
  ranked: readonly EntityScore[],
  context: ConversationContext,
  options: CategorizeOptions = {}
): CategorizedEntities {
  const { maxPrimary = 7, maxRelated = 8 } = options;
  const primary: EntityScore[] = [];
  const related: EntityScore[] = [];
  if (ranked.length === 0) return { primary, related };

  const topScore = ranked[0]?.finalScore ?? 0;
  const scoreThreshold = topScore > 0 ? Math.max(0.3, topScore * 0.7) : 0.3;
  const seenDeviceClasses = new Set<string>();

  for (const score of ranked) {
    const { area, deviceClass } = score.entity;
    const highScore = score.finalScore >= scoreThreshold;
    const areaMatch = area !== null && context.areasMentioned.includes(area);
    const deviceMatch = deviceClass !== null && context.deviceClassesMentioned.includes(deviceClass);
    const sameAreaAsPrimary = primary.some((p) => p.entity.area === area);
    const complementary = !seenDeviceClasses.has(deviceClass ?? '') && seenDeviceClasses.size < 3;

    let isPrimary = false;
    if (primary.length < maxPrimary) {
      if (primary.length === 0 && score.finalScore > 0.1) isPrimary = true;
      else if (areaMatch && (deviceMatch || highScore)) isPrimary = true;
      else if (sameAreaAsPrimary && highScore && complementary) isPrimary = true;
      else if (highScore && complementary && primary.length < 3) isPrimary = true;
    }

    if (isPrimary) {
      primary.push(score);
      seenDeviceClasses.add(deviceClass ?? '');
    } else if (related.length < maxRelated) {
      related.push(score);
    }
  }

  return { primary, related };
}

// ═══════════════════════════════════════════════════════════════════════════════
// Entity Rendering
// ═══════════════════════════════════════════════════════════════════════════════

export function displayName(entity: EntityCandidate): string {
  const friendly = entity.friendlyName?.trim();
  if (friendly && !GENERIC_NAMES.has(friendly.toLowerCase())) return friendly;

  if (entity.domain === 'sensor') {
    const id = entity.entityId.toLowerCase();
    for (const [keyword, label] of SENSOR_LABELS) {
      if (entity.deviceClass === keyword || id.includes(keyword)) return label;
    }
    return friendly || 'Szenzor';
  }

  return DOMAIN_LABELS[entity.domain] ?? (friendly || entity.entityId);
}

/** "nappali_sarok" → "Nappali Sarok" */
export function areaDisplayName(area: string): string {
  return area
    .split('_')
    .filter((part) => part.length > 0)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join(' ');
}

/** ": 21.5 °C" for sensors with a state, "" otherwise */
export function valueSuffix(entity: EntityCandidate): string {
  if (entity.domain !== 'sensor' || entity.state === null) return '';
  const unit = entity.attributes['unit_of_measurement'];
  return typeof unit === 'string' && unit.length > 0
    ? `: ${entity.state} ${unit}`
    : `: ${entity.state}`;
}

/**
 * Area aliases announced in entity texts ("... Aliases: lounge living").
 */
export function collectAreas(scores: readonly EntityScore[]): Map<string, string[]> {
  const areas = new Map<string, string[]>();
  for (const { entity } of scores) {
    if (!entity.area || areas.has(entity.area)) continue;

    const text = entity.text ?? '';
    const marker = text.lastIndexOf('Aliases:');
    const aliases =
      marker >= 0
        ? text
            .slice(marker + 'Aliases:'.length)
            .split(/\s+/)
            .filter((alias) => alias.length > 0)
        : [];
    areas.set(entity.area, aliases);
  }
  return areas;
}

function entityLine(score: EntityScore): string {
  const { entity } = score;
  const area = entity.area ? ` [${areaDisplayName(entity.area)}]` : '';
  return `- ${displayName(entity)}${area}${valueSuffix(entity)}`;
}

function entityListLine(scores: readonly EntityScore[]): string {
  return `${ENTITY_LIST_PREFIX} ${scores.map((s) => s.entity.entityId).join(', ')}`;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Formats
// ═══════════════════════════════════════════════════════════════════════════════

export function formatCompact({ primary, related }: CategorizedEntities): string {
  return [...primary, ...related]
    .map(({ entity }) => {
      const area = entity.area ? ` [${areaDisplayName(entity.area)}]` : '';
      return `${displayName(entity)}${area}${valueSuffix(entity)}`;
    })
    .join(' | ');
}

export function formatDetailed(categorized: CategorizedEntities): string {
  const { primary, related } = categorized;
  const all = [...primary, ...related];
  const lines: string[] = [PROMPT_HEADER];

  if (primary.length > 0) {
    lines.push(primary.length === 1 ? 'Primary entity:' : 'Primary entities:');
    lines.push(...primary.map(entityLine));
  }

  if (related.length > 0) {
    lines.push('');
    lines.push('Related entities:');
    lines.push(...related.map(entityLine));
  }

  const areas = collectAreas(all);
  if (areas.size > 0) {
    lines.push('');
    lines.push('Areas:');
    for (const [area, aliases] of areas) {
      lines.push(aliases.length > 0 ? `- ${area}: ${aliases.join(', ')}` : `- ${area}`);
    }
  }

  if (all.length > 0) {
    lines.push('');
    lines.push(entityListLine(all));
  }

  return lines.join('\n');
}

export function formatGroupedByArea(categorized: CategorizedEntities): string {
  const { primary, related } = categorized;
  const all = [...primary, ...related];
  const primarySet = new Set(primary);
  const lines: string[] = [PROMPT_HEADER, 'Entities by area:', ''];

  const groups = new Map<string, string[]>();
  for (const score of all) {
    const area = score.entity.area ?? 'unknown';
    const marker = primarySet.has(score) ? '[P]' : '[R]';
    const line = `- ${marker} ${displayName(score.entity)}${valueSuffix(score.entity)}`;
    const group = groups.get(area);
    if (group) group.push(line);
    else groups.set(area, [line]);
  }

  const areas = collectAreas(all);
  for (const [area, entries] of groups) {
    const aliases = areas.get(area) ?? [];
    lines.push(aliases.length > 0 ? `${area} (${aliases.join(', ')}):` : `${area}:`);
    lines.push(...entries);
    lines.push('');
  }

  if (all.length > 0) lines.push(entityListLine(all));

  return lines.join('\n').trimEnd();
}

export function formatTldr(categorized: CategorizedEntities): string {
  const all = [...categorized.primary, ...categorized.related];
  const detailed = formatDetailed(categorized);
  if (all.length === 0) return detailed;

  const counts = new Map<string, number>();
  for (const { entity } of all) {
    const area = entity.area ?? 'unknown';
    counts.set(area, (counts.get(area) ?? 0) + 1);
  }
  const summary = Array.from(counts, ([area, count]) => `${area} (${count} entities)`).join(', ');

  return `${detailed}\n\nTL;DR: Monitoring: ${summary}`;
}

/**
 * Render ranked entities with the given format.
 */
export function formatPrompt(
  ranked: readonly EntityScore[],
  format: PromptFormat,
  context: ConversationContext,
  options?: CategorizeOptions
): string {
  const categorized = categorizeEntities(ranked, context, options);

  switch (format) {
    case 'compact':
      return formatCompact(categorized);
    case 'grouped_by_area':
      return formatGroupedByArea(categorized);
    case 'tldr':
      return formatTldr(categorized);
    case 'detailed':
      return formatDetailed(categorized);
  }
}
