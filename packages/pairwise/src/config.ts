import { readFileSync } from 'node:fs';
import { z } from 'zod';

const seconds = z.number().nonnegative();
const pixels = z.number().int().nonnegative();

export const DEFAULT_TRAITS = [
  'Extraversion',
  'Agreeableness',
  'Conscientiousness',
  'Emotional Stability',
  'Openness',
];

export const DEFAULT_QUESTIONS: Record<string, string> = {
  Extraversion: 'Which person appears more outgoing, sociable, and energetic?',
  Agreeableness: 'Which person appears more friendly, cooperative, and warm?',
  Conscientiousness:
    'Which person appears more organized, responsible, and reliable?',
  'Emotional Stability':
    'Which person appears more calm, emotionally stable, and resilient?',
  Openness:
    'Which person appears more open to new experiences, creative, and curious?',
};

export const configSchema = z
  .object({
    experimentName: z.string().default('Pairwise Personality Perception Study'),
    experimentVersion: z.string().default('1.0.0'),

    // traits
    traits: z.array(z.string().min(1)).default(() => [...DEFAULT_TRAITS]),
    questionTemplates: z
      .record(z.string())
      .default(() => ({ ...DEFAULT_QUESTIONS })),
    videoBasePath: z.string().default('stimuli/videos/study_videos'),

    // timing
    fixationDuration: seconds.default(1),
    videoDuration: seconds.default(16),
    interTrialInterval: seconds.default(0.5),
    /** `null` waits for a response indefinitely */
    responseTimeout: seconds.nullable().default(null),

    // display
    screenWidth: pixels.default(1920),
    screenHeight: pixels.default(1080),
    videoWidth: pixels.default(640),
    videoHeight: pixels.default(480),
    videoSeparation: pixels.default(100),
    interestAreaPadding: pixels.default(20),

    // responses
    enableConfidenceRating: z.boolean().default(true),
    confidenceLevels: z.number().int().min(2).default(5),

    // data
    dataFolder: z.string().default('data'),
    dataFilePrefix: z.string().min(1).default('participant'),
    dataFileFormat: z.enum(['csv', 'json']).default('csv'),

    // eye tracking
    eyeTrackerEnabled: z.boolean().default(false),

    // trial structure
    pairing: z.enum(['full', 'bounded']).default('full'),
    maxPairsPerTrait: z.number().int().positive().default(25),
    positionPolicy: z
      .enum(['deterministic', 'randomized'])
      .default('randomized'),
    randomizeTrialOrder: z.boolean().default(true),
    minTraitSpacing: z.number().int().nonnegative().default(2),
    includePractice: z.boolean().default(true),
    numPracticeTrials: z.number().int().nonnegative().default(1),
    enableBreaks: z.boolean().default(true),
    trialsBetweenBreaks: z.number().int().positive().default(20),
  })
  .strict();

export type ExperimentConfig = Readonly<z.output<typeof configSchema>>;
export type ExperimentConfigInput = z.input<typeof configSchema>;

const freeze = (config: z.output<typeof configSchema>): ExperimentConfig => {
  Object.freeze(config.traits);
  Object.freeze(config.questionTemplates);
  return Object.freeze(config);
};

/**
 * Validate settings and fill defaults
 *
 * The returned value is frozen, build a new one to change settings between
 * sessions.
 *
 * @example
 *
 * ```ts
 * const config = defineConfig({ traits: ['Openness'], minTraitSpacing: 1 });
 * config.videoDuration; // 16
 * ```
 */
export const defineConfig = (
  input: ExperimentConfigInput = {},
): ExperimentConfig => freeze(configSchema.parse(input));

/** Read settings from a JSON file */
export const loadConfig = (filepath: string): ExperimentConfig => {
  const text = readFileSync(filepath, 'utf-8');
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new Error(`Invalid JSON in config file ${filepath}`, { cause: err });
  }
  return freeze(configSchema.parse(json));
};

/** Question shown after the videos of a trait */
export const questionFor = (config: ExperimentConfig, trait: string) =>
  Object.hasOwn(config.questionTemplates, trait)
    ? config.questionTemplates[trait]
    : `Which person appears higher in ${trait}?`;
