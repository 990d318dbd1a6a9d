import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { manifestSchema } from './schema.js';
import type { Manifest } from './schema.js';
import { logger } from '../observability/logger.js';

const log = logger.child({ module: 'manifest:loader' });

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Parses manifest text as YAML, falling back to strict JSON (YAML 1.2 is a
 * superset of JSON, so JSON-style manifests load either way).
 */
export function parseManifestText(content: string): unknown {
  const trimmed = content.trim();
  try {
    return yaml.load(trimmed);
  } catch (yamlErr) {
    log.debug({ err: yamlErr }, 'YAML parse failed, retrying as JSON');
    try {
      return JSON.parse(trimmed);
    } catch (jsonErr) {
      throw new Error(
        'Manifest is neither valid YAML nor JSON. Fix the syntax of resume.yaml, ' +
          'or make sure js-yaml is installed if the manifest relies on YAML-only syntax.',
        { cause: jsonErr },
      );
    }
  }
}

/** Validates parsed manifest data; the result is frozen. */
export function parseManifest(content: string): Readonly<Manifest> {
  const data = manifestSchema.parse(parseManifestText(content));
  return deepFreeze(data);
}

export function loadManifest(path: string): Readonly<Manifest> {
  const raw = readFileSync(path, 'utf-8');
  const manifest = parseManifest(raw);
  log.info(
    { path, jobs: manifest.experience.length, technical: manifest.technical_experience.length },
    'Manifest loaded',
  );
  return manifest;
}
