import { byName } from '../utils/sort.js';
import type { NixManifest, ResolvedMod } from '../types/index.js';

type NixValue = string | number | boolean | NixValue[] | { [key: string]: NixValue };

const MOD_FIELDS: Array<keyof ResolvedMod> = [
  'title',
  'name',
  'id',
  'side',
  'required',
  'default',
  'deps',
  'filename',
  'encoded',
  'page',
  'src',
  'type',
  'md5',
  'sha256',
  'size',
];

export function serializeNixManifest(manifest: NixManifest): string {
  const mods: Record<string, NixValue> = {};
  for (const mod of [...manifest.mods].sort(byName)) {
    mods[mod.name] = modToNix(mod);
  }

  return `${render({ version: manifest.version, imports: manifest.imports, mods }, 0)}\n`;
}

function modToNix(mod: ResolvedMod): Record<string, NixValue> {
  const record: Record<string, NixValue> = {};
  for (const field of MOD_FIELDS) {
    const value = mod[field];
    if (value !== undefined) {
      record[field] = value;
    }
  }
  return record;
}

function render(value: NixValue, depth: number): string {
  if (typeof value === 'string') {
    return nixString(value);
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }

  const indent = '  '.repeat(depth + 1);
  const closing = '  '.repeat(depth);
  if (Array.isArray(value)) {
    if (value.length === 0) {
      return '[ ]';
    }
    return `[\n${value.map((item) => `${indent}${render(item, depth + 1)}`).join('\n')}\n${closing}]`;
  }

  const entries = Object.entries(value);
  if (entries.length === 0) {
    return '{ }';
  }
  const lines = entries.map(([key, item]) => `${indent}${nixKey(key)} = ${render(item, depth + 1)};`);
  return `{\n${lines.join('\n')}\n${closing}}`;
}

export function nixString(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\$\{/g, '\\${')
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}

const KEYWORDS = new Set(['assert', 'else', 'if', 'in', 'inherit', 'let', 'or', 'rec', 'then', 'with']);

function nixKey(key: string): string {
  return /^[A-Za-z_][A-Za-z0-9_'-]*$/.test(key) && !KEYWORDS.has(key) ? key : nixString(key);
}
