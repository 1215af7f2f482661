const SAFE_WORD = /^[\w@%+=:,./-]+$/;

export function shellQuote(value: string): string {
  if (value === '') {
    return `''`;
  }
  if (SAFE_WORD.test(value)) {
    return value;
  }
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export function shellJoin(words: string[]): string {
  return words.map(shellQuote).join(' ');
}

export interface WindowScriptOptions {
  cwd: string;
  command: string[];
  env?: Record<string, string>;
  activateScript?: string;
  /** Shell the window falls back to once the command exits. */
  keepAliveShell?: string;
}

/**
 * Builds the `bash -c` body of a session window: enter the service directory, export its
 * environment, activate the dependency environment, run the command, then stay open in an
 * interactive shell whatever the command's outcome.
 */
export function buildWindowScript(options: WindowScriptOptions): string {
  const steps = [ `cd ${shellQuote(options.cwd)}` ];
  const env = options.env ?? {};
  const exports = Object.keys(env)
    .sort()
    .map((key) => `${key}=${shellQuote(env[key])}`);
  if (exports.length > 0) {
    steps.push(`export ${exports.join(' ')}`);
  }
  if (options.activateScript) {
    steps.push(`source ${shellQuote(options.activateScript)}`);
  }
  steps.push(shellJoin(options.command));
  return `${steps.join(' && ')}; exec ${options.keepAliveShell ?? 'bash'}`;
}
