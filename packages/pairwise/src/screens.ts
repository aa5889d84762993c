import type { ExperimentConfig } from './config';

/** Text screens shown between trials */
export type Screen =
  | 'welcome'
  | 'instructions'
  | 'practice'
  | 'main'
  | 'break'
  | 'end';

const CONTINUE = 'Press SPACE to continue.';

export const welcomeText = (config: ExperimentConfig) => `Welcome to the ${config.experimentName}.

In this study you will watch pairs of short videos and judge
the personality of the people in them.

${CONTINUE}`;

export const instructionText = (config: ExperimentConfig) => {
  const steps = [
    'A fixation cross (+) appears in the centre of the screen. Please look at it.',
    `Two videos play side by side for about ${config.videoDuration} seconds. Watch both carefully.`,
    'A question asks which person shows MORE of a trait.',
    'Use the LEFT and RIGHT arrow keys to choose.',
  ];
  if (config.enableConfidenceRating) {
    steps.push(
      `Rate how confident you are from 1 to ${config.confidenceLevels}.`,
    );
  }
  return `INSTRUCTIONS

${steps.map((step, i) => `${i + 1}. ${step}`).join('\n')}

There are no right or wrong answers, go with your first impression.

${CONTINUE}`;
};

export const practiceText = () => `A few practice trials come first.

${CONTINUE}`;

export const mainText = () => `Practice complete!

The main part begins now.

${CONTINUE}`;

export const breakText = (completed: number, total: number) => `Time for a short break.

You have completed ${completed} out of ${total} trials.

${CONTINUE}`;

export const endText = () => `Thank you for taking part!

Your responses have been recorded.

Press SPACE to exit.`;
