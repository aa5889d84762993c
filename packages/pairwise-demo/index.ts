import {
  confirm,
  intro,
  isCancel,
  log,
  outro,
  select,
  text,
} from '@clack/prompts';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import {
  createEyeTracker,
  defineConfig,
  ExperimentSession,
  loadCatalog,
  loadConfig,
  SessionLogger,
  TrialSequencer,
} from 'pairwise';
import { TerminalPresenter, TerminalResponses } from './src/terminal';

const bundled = (filename: string) =>
  fileURLToPath(new URL(filename, import.meta.url));
const unwrap = async <T>(maybeCancelPromise: Promise<T | symbol>) => {
  const result = await maybeCancelPromise;
  if (isCancel(result)) {
    outro('Cancelled.');
    process.exit(0);
  }
  return result;
};

const { values: args } = parseArgs({
  options: {
    config: { type: 'string', default: bundled('./config.json') },
    catalog: { type: 'string', default: bundled('./catalog.json') },
  },
});

intro('Pairwise personality perception');

// input
const participantId = (
  await unwrap(
    text({
      message: 'Participant ID:',
      placeholder: 'P001',
      validate: (value) => (value.trim() ? undefined : 'Required'),
    }),
  )
).trim();
const session = Number(
  await unwrap(
    text({
      message: 'Session number:',
      placeholder: '1',
      defaultValue: '1',
      validate: (value) =>
        value === '' || /^[1-9]\d*$/.test(value)
          ? undefined
          : 'Expect a positive integer',
    }),
  ),
);
const includePractice = await unwrap(
  confirm({ message: 'Include practice trials?', initialValue: true }),
);
const timeScale = await unwrap(
  select({
    message: 'Timing:',
    options: [
      { value: 1, label: 'Real time' },
      { value: 0.1, label: 'Fast', hint: '10× shorter' },
    ],
    initialValue: 1,
  }),
);

// setup
const config = defineConfig({ ...loadConfig(args.config), includePractice });
const catalog = loadCatalog(args.catalog);
if (config.responseTimeout !== null) {
  log.warn('The terminal waits for every response, responseTimeout is ignored.');
}

const sequencer = new TrialSequencer(config);
sequencer.generateTrials(catalog, participantId);
if (includePractice) sequencer.generatePracticeTrials(catalog);
const { missing } = sequencer.validateStimuli();
if (missing.length) {
  log.warn(
    `${missing.length} video files missing below ${config.videoBasePath}, showing file names instead`,
  );
}

const logger = new SessionLogger(config, participantId, session);
sequencer.save(logger.files.trials);

const experiment = new ExperimentSession({
  sequencer,
  logger,
  tracker: createEyeTracker(config),
  presenter: new TerminalPresenter(timeScale),
  responses: new TerminalResponses(),
});
process.once('SIGINT', () => {
  experiment.close();
  process.exit(130);
});

// run
const status = await experiment.run();
outro(
  status === 'completed'
    ? `Session completed. Data saved to ${logger.files.results}`
    : `Session aborted. Data saved to ${logger.files.results}`,
);
