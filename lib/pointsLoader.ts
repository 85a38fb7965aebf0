import fs from 'fs';
import { parse } from 'csv-parse/sync';

import { PointDefinition, PointValue } from './point';
import { POINT_KIND_TRAITS, parsePointKind } from './pointKinds';
import { PointRegistry } from './pointRegistry';
import { isValidPriority } from './priorityResolver';
import { inferEngineeringUnit, parseEngineeringUnit } from './units';

export interface PointRowFailure {
  /** 1-based data row, not counting the header. */
  row: number;
  type: string;
  instance: string;
  name: string;
  message: string;
}

export interface PointRow {
  row: number;
  definition: PointDefinition;
}

export interface PointsParseResult {
  rows: PointRow[];
  failures: PointRowFailure[];
}

export interface PointsLoadReport {
  registered: number;
  failures: PointRowFailure[];
}

type CsvRecord = Record<string, string>;

function isCsvRecord(value: unknown): value is CsvRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    && Object.values(value).every((entry) => typeof entry === 'string');
}

function column(record: CsvRecord, name: string): string {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(record)) {
    if (key.trim().toLowerCase() === wanted) return value.trim();
  }
  return '';
}

export function isBlankValue(raw: string): boolean {
  return /^[\s\-–—]*$/.test(raw);
}

/**
 * Reads the numeric part of a table value: "[2] Heating" → 2, "72.9 °F" → 72.9,
 * "active" → 1. Returns null when nothing numeric is present.
 */
export function parsePresentValue(raw: string): number | null {
  const text = raw.trim();
  const indexed = text.match(/^\[(\d+)\]/);
  if (indexed) return Number(indexed[1]);

  const lower = text.toLowerCase();
  if (['active', 'on', 'true'].includes(lower)) return 1;
  if (['inactive', 'off', 'false'].includes(lower)) return 0;

  const numeric = text.match(/[-+]?\d+(?:\.\d+)?(?:[eE][-+]?\d+)?/);
  return numeric ? Number(numeric[0]) : null;
}

/** State names from "[1]=Cooling, [2]=Heating" style descriptions. */
export function parseStateText(description: string): string[] | undefined {
  const entries = Array.from(description.matchAll(/\[(\d+)\]\s*=\s*([^,\]]+)/g))
    .map((match) => ({ index: Number(match[1]), text: match[2].trim() }))
    .filter((entry) => entry.text !== '')
    .sort((a, b) => a.index - b.index);
  return entries.length > 0 ? entries.map((entry) => entry.text) : undefined;
}

function parseOverride(raw: string): number | undefined | null {
  const text = raw.trim().toLowerCase();
  if (text === '' || ['false', 'no', 'none', '0'].includes(text)) return undefined;
  const priority = Number(text);
  return isValidPriority(priority) ? priority : null;
}

function uniqueName(name: string, seen: Map<string, number>): string {
  const count = seen.get(name) ?? 0;
  seen.set(name, count + 1);
  return count === 0 ? name : `${name}_${count}`;
}

export function parsePointsCsv(text: string): PointsParseResult {
  const parsed: unknown = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });
  const records = Array.isArray(parsed) ? parsed : [];

  const rows: PointRow[] = [];
  const failures: PointRowFailure[] = [];
  const seenNames = new Map<string, number>();

  records.forEach((record: unknown, index) => {
    const row = index + 1;
    if (!isCsvRecord(record)) {
      failures.push({
        row, type: '', instance: '', name: '', message: 'Unreadable row',
      });
      return;
    }

    const type = column(record, 'Type');
    const instanceText = column(record, 'Instance');
    const rawName = column(record, 'Name');
    const fail = (message: string) => failures.push({
      row, type, instance: instanceText, name: rawName, message,
    });

    const kind = parsePointKind(type);
    if (!kind) {
      fail(`Unknown object type "${type}"`);
      return;
    }

    const instance = Number(instanceText);
    if (instanceText === '' || !Number.isInteger(instance) || instance < 0) {
      fail(`Invalid instance "${instanceText}"`);
      return;
    }

    const { family, abbreviation } = POINT_KIND_TRAITS[kind];
    const rawValue = column(record, 'PresentValue');
    let initialValue: PointValue;
    if (isBlankValue(rawValue)) {
      initialValue = family === 'analog' ? 0 : family === 'binary' ? false : 1;
    } else {
      const numeric = parsePresentValue(rawValue);
      if (numeric === null) {
        fail(`Present value "${rawValue}" is not numeric`);
        return;
      }
      if (family === 'binary') initialValue = numeric !== 0;
      else if (family === 'multistate') initialValue = Math.max(1, Math.trunc(numeric));
      else initialValue = numeric;
    }

    const overridePriority = parseOverride(column(record, 'Override'));
    if (overridePriority === null) {
      fail(`Override "${column(record, 'Override')}" is not a priority in [1, 16]`);
      return;
    }

    const name = uniqueName(rawName === '' ? `${abbreviation}${instance}` : rawName, seenNames);
    const description = column(record, 'Description');
    const definition: PointDefinition = {
      kind, instance, name, initialValue, description,
    };

    if (family === 'analog') {
      const unitsText = column(record, 'Units');
      definition.units = unitsText === ''
        ? inferEngineeringUnit(name, rawValue)
        : parseEngineeringUnit(unitsText) ?? inferEngineeringUnit(name, rawValue);
    }
    if (family === 'multistate') {
      const statesText = column(record, 'States');
      definition.stateText = statesText === ''
        ? parseStateText(description)
        : statesText.split('|').map((state) => state.trim()).filter((state) => state !== '');
    }
    if (overridePriority !== undefined) definition.overridePriority = overridePriority;

    rows.push({ row, definition });
  });

  return { rows, failures };
}

export function loadPointsFile(filePath: string): PointsParseResult {
  return parsePointsCsv(fs.readFileSync(filePath, 'utf8'));
}

/** Registers parsed rows; rows the registry rejects join the parse failures. */
export function registerPoints(registry: PointRegistry, parsed: PointsParseResult): PointsLoadReport {
  const failures = [...parsed.failures];
  let registered = 0;
  for (const { row, definition } of parsed.rows) {
    const result = registry.define(definition);
    if (result.ok) {
      registered += 1;
      continue;
    }
    failures.push({
      row,
      type: definition.kind,
      instance: String(definition.instance),
      name: definition.name,
      message: `${result.error}: ${result.message}`,
    });
  }
  failures.sort((a, b) => a.row - b.row);
  return { registered, failures };
}

export function groupFailuresByMessage(failures: PointRowFailure[]): Map<string, PointRowFailure[]> {
  const groups = new Map<string, PointRowFailure[]>();
  for (const failure of failures) {
    const key = failure.message.replace(/\b[a-zA-Z]+:\d+: /, '');
    const group = groups.get(key) ?? [];
    group.push(failure);
    groups.set(key, group);
  }
  return groups;
}
