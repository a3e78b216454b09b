import { SCHEMA_VERSION, type SettingsEnvelope } from './schemas';

export type Migration<T> = (input: unknown) => T;

type MigrationStep = (payload: Record<string, unknown>) => Record<string, unknown>;

const LEGACY_KEYS: Record<string, string> = {
  gptModel: 'completionModel',
  postProcessingPrompt: 'cleanupPrompt',
  enableGPTProcessing: 'postProcessing',
  whisperLanguage: 'language',
};

// Step N upgrades a version N payload to version N + 1.
const STEPS: Record<number, MigrationStep> = {
  0: (payload) =>
    Object.fromEntries(
      Object.entries(payload).map(([key, value]) => [LEGACY_KEYS[key] ?? key, value])
    ),
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const migrateToCurrent = <T>(input: SettingsEnvelope, parser: Migration<T>) => {
  const version = input.version ?? 0;
  if (version > SCHEMA_VERSION) {
    throw new Error(`Unsupported schema version: ${version}`);
  }
  let payload = input.payload;
  for (let step = version; step < SCHEMA_VERSION; step += 1) {
    const upgrade = STEPS[step];
    if (upgrade && isRecord(payload)) payload = upgrade(payload);
  }
  return parser(payload);
};
