import type { CheerioAPI } from 'cheerio';
import { Snapshot } from '../types';

// Profile box: each label cell is followed by a sibling holding its value
export const LABEL_SELECTOR = '.userbox_tartalom_mini .profil_jobb_elso2';
// Torrent list headers, e.g. "Seedelt torrentek (12)"
export const SEEDING_HEADER_SELECTOR = '.lista_mini_fej';

const SEEDING_PATTERN = /\((\d+)\)/;

type FieldSetter = (snapshot: Snapshot, value: string) => void;

/**
 * The closed set of labels the extractor understands. A label missing from
 * this map has no setter, so it cannot touch the snapshot.
 */
export const FIELD_SETTERS: ReadonlyMap<string, FieldSetter> = new Map<string, FieldSetter>([
  ['Helyezés:', (snapshot, value) => { snapshot.rank = parseInteger(value); }],
  ['Feltöltés:', (snapshot, value) => { snapshot.upload = value; }],
  ['Aktuális feltöltés:', (snapshot, value) => { snapshot.currentUpload = value; }],
  ['Aktuális letöltés:', (snapshot, value) => { snapshot.currentDownload = value; }],
  ['Pontok száma:', (snapshot, value) => { snapshot.points = parseInteger(value); }],
]);

/**
 * Lenient integer conversion: "42." -> 42, "1 234" -> 1234, anything that is
 * not a plain integer once trailing punctuation and separators are gone -> 0.
 */
export function parseInteger(value: string): number {
  const normalized = value
    .trim()
    .replace(/[.:]+$/, '')
    .replace(/[\s,]/g, '');

  if (!/^[+-]?\d+$/.test(normalized)) {
    return 0;
  }

  const parsed = Number.parseInt(normalized, 10);
  return Number.isSafeInteger(parsed) ? parsed : 0;
}

/** "Seeding torrents (12)" -> 12; no parenthesized number -> 0. */
export function extractSeedingCount(text: string): number {
  const match = SEEDING_PATTERN.exec(text);
  return match ? parseInteger(match[1]) : 0;
}

export function emptySnapshot(owner: string, recordedAt: Date): Snapshot {
  return {
    owner,
    recordedAt,
    rank: 0,
    upload: '',
    currentUpload: '',
    currentDownload: '',
    points: 0,
    seedingCount: 0,
  };
}

/**
 * Builds a snapshot from a parsed profile page. Pure: the same document and
 * timestamp always give the same snapshot, and nothing here throws on odd markup.
 */
export function extractProfile($: CheerioAPI, owner: string, recordedAt: Date = new Date()): Snapshot {
  const snapshot = emptySnapshot(owner, recordedAt);

  $(LABEL_SELECTOR).each((_, element) => {
    const label = $(element).text().trim();
    const setter = FIELD_SETTERS.get(label);
    if (setter) {
      setter(snapshot, $(element).next().text().trim());
    }
  });

  // Last matching header wins
  $(SEEDING_HEADER_SELECTOR).each((_, element) => {
    const text = $(element).text();
    if (SEEDING_PATTERN.test(text)) {
      snapshot.seedingCount = extractSeedingCount(text);
    }
  });

  return snapshot;
}
