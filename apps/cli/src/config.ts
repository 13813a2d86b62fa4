export interface CliConfig {
  readonly color: boolean;
  readonly prompt: string;
}

export const DEFAULT_PROMPT = 'todo> ';

/** Read CLI settings from the environment (`NO_COLOR`, `TODO_PROMPT`) */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
  return {
    color: env['NO_COLOR'] === undefined,
    prompt: env['TODO_PROMPT'] || DEFAULT_PROMPT,
  };
}
