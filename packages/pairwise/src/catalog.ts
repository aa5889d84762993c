import { existsSync, readFileSync, readdirSync } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { Level } from '../types';

export const catalogSchema = z.record(
  z.object({
    high: z.array(z.string().min(1)),
    low: z.array(z.string().min(1)),
  }),
);

/** Video identifiers per trait, split by the level of the trait they show */
export type StimulusCatalog = z.output<typeof catalogSchema>;

/** Validate a catalog object */
export const parseCatalog = (value: unknown): StimulusCatalog =>
  catalogSchema.parse(value);

/** Read a catalog from a JSON file */
export const loadCatalog = (filepath: string) => {
  const text = readFileSync(filepath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in catalog file ${filepath}`, { cause: err });
  }
  return parseCatalog(json);
};

/**
 * Folder name of a trait
 *
 * @example
 *
 * ```ts
 * traitFolder('Emotional Stability'); // 'emotional_stability'
 * ```
 */
export const traitFolder = (trait: string) =>
  trait.toLowerCase().replaceAll(' ', '_');

/** Path of a video file below the stimulus folder */
export const videoPath = (
  basePath: string,
  trait: string,
  level: Level,
  video: string,
) => path.join(basePath, traitFolder(trait), level, video);

const listVideos = (dir: string) =>
  existsSync(dir)
    ? readdirSync(dir)
        .filter((name) => name.toLowerCase().endsWith('.mp4'))
        .sort()
    : [];

/**
 * Build a catalog from a stimulus folder laid out as
 * `<basePath>/<trait_folder>/{high,low}/*.mp4`
 *
 * Traits without videos on both levels are left out with a warning.
 */
export const scanCatalog = (basePath: string, traits: readonly string[]) => {
  const catalog: StimulusCatalog = {};
  for (const trait of traits) {
    const folder = path.join(basePath, traitFolder(trait));
    const high = listVideos(path.join(folder, 'high'));
    const low = listVideos(path.join(folder, 'low'));
    if (high.length && low.length) {
      catalog[trait] = { high, low };
      console.info(
        `Loaded ${high.length} high + ${low.length} low videos for ${trait}`,
      );
    } else {
      console.warn(`No videos found for ${trait} in ${folder}`);
    }
  }
  return catalog;
};

/** Video pools of a trait, ignoring keys inherited from `Object.prototype` */
export const traitPools = (catalog: StimulusCatalog, trait: string) =>
  Object.hasOwn(catalog, trait) ? catalog[trait] : undefined;

/**
 * Traits that can produce trials: configured, present in the catalog and with
 * a non-empty pool on both levels. Each gap is reported with a warning.
 */
export const usableTraits = (
  catalog: StimulusCatalog,
  traits: readonly string[],
) =>
  traits.filter((trait) => {
    const pools = traitPools(catalog, trait);
    if (!pools) {
      console.warn(`No stimuli defined for trait "${trait}"`);
      return false;
    }
    if (!pools.high.length || !pools.low.length) {
      console.warn(`Empty high or low video pool for trait "${trait}"`);
      return false;
    }
    return true;
  });
