export type SupervisorBackend = 'screen' | 'tmux' | 'native';
export type BackendChoice = SupervisorBackend | 'auto';
export type SettleMode = 'fixed' | 'probe';

export interface ProbeTiming {
  /** Attempts before giving up. */
  retries?: number;
  /** Delay after the first failed attempt, in ms; doubled after each further failure. */
  initialDelay?: number;
  /** Upper bound for the backoff delay, in ms. */
  maxDelay?: number;
}

/**
 * Host, port and url may reference environment variables as `${NAME}`; they are expanded when probed.
 */
export type ReadinessProbeSpec =
  | ({ type: 'tcp'; host: string; port: string | number } & ProbeTiming)
  | ({ type: 'http'; url: string } & ProbeTiming);

export interface ServiceSpec {
  /** Unique within a run; also the window label. */
  name: string;
  /** Executable followed by its arguments. */
  command: string[];
  /** Position in the declared sequence, 0-based. */
  windowIndex: number;
  /** Name of an earlier service that must be up before this one starts. */
  dependsOn?: string;
  /** Minimum wait after launching this service before the next one, in ms. */
  settleDelay: number;
  /** Working directory, relative to the working root. */
  cwd?: string;
  env?: Record<string, string>;
  readiness?: ReadinessProbeSpec;
}

export interface EnvironmentSettings {
  rootPath: string;
  manifestPath: string;
  /** Interpreter used to create the environment. */
  interpreter: string;
}

export interface OrchestrationConfig {
  sessionName: string;
  backend: BackendChoice;
  /** Absolute directory every relative path is resolved against. */
  workingRoot: string;
  environment: EnvironmentSettings;
  envFile: string;
  settle: { mode: SettleMode };
  services: ServiceSpec[];
}

export const DEFAULT_SESSION_NAME = 'game_system';

/**
 * The platform's stock service list: database first, the two lobbies after it.
 */
export const DEFAULT_SERVICES: ServiceSpec[] = [
  {
    name: 'database',
    command: [ 'python', 'server/db.py' ],
    windowIndex: 0,
    settleDelay: 2000,
    readiness: { type: 'tcp', host: '${DB_HOST}', port: '${DB_PORT}' },
  },
  {
    name: 'developer',
    command: [ 'python', 'server/developer_server.py' ],
    windowIndex: 1,
    dependsOn: 'database',
    settleDelay: 1000,
    readiness: { type: 'tcp', host: '${SERVER_HOST}', port: '${DEVELOPER_PORT}' },
  },
  {
    name: 'player',
    command: [ 'python', 'server/player_server.py' ],
    windowIndex: 2,
    dependsOn: 'database',
    settleDelay: 0,
  },
];

export function defaultConfig(workingRoot: string): OrchestrationConfig {
  return {
    sessionName: DEFAULT_SESSION_NAME,
    backend: 'screen',
    workingRoot,
    environment: {
      rootPath: '.venv',
      manifestPath: 'requirements.txt',
      interpreter: 'python3',
    },
    envFile: '.env',
    settle: { mode: 'fixed' },
    services: DEFAULT_SERVICES.map((service) => ({ ...service })),
  };
}

/** Keys the launched services read from the env file. */
export const SERVICE_ENV_KEYS = [
  'SERVER_HOST',
  'PLAYER_PORT',
  'DEVELOPER_PORT',
  'DB_HOST',
  'DB_PORT',
  'GAME_SERVER_PORT_BASE',
] as const;
