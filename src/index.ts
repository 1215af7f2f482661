import { ConfigurableLoggerFactory } from './logging/ConfigurableLoggerFactory';
import { EnvironmentProvisioner } from './environment/EnvironmentProvisioner';
import { Orchestrator } from './orchestrator/Orchestrator';
import { SessionRegistry } from './orchestrator/SessionRegistry';
import { DependencyGate } from './orchestrator/DependencyGate';
import { ProcessLauncher } from './orchestrator/ProcessLauncher';
import { NetworkReadinessProbe } from './orchestrator/ReadinessProbe';
import { ScreenSupervisor } from './supervisor/ScreenSupervisor';
import { TmuxSupervisor } from './supervisor/TmuxSupervisor';
import { NativeSupervisor } from './supervisor/NativeSupervisor';

export * from './errors';
export * from './config/OrchestrationConfig';
export { loadOrchestrationConfig, loadEnvFile, parseConfig } from './config/loadConfig';
export { createSupervisor } from './supervisor';
export { describeEnvironment } from './environment/EnvironmentProvisioner';
export type { EnvironmentDescriptor, ProvisionedEnvironment } from './environment/EnvironmentProvisioner';
export type {
  OrchestrationReport,
  OrchestratorDependencies,
  OrchestratorState,
  ServiceOutcome,
  ServiceSummary,
} from './orchestrator/Orchestrator';
export type { SessionHandle, WindowHandle, ResetResult } from './orchestrator/SessionRegistry';
export type { LaunchResult } from './orchestrator/ProcessLauncher';
export type { ReadinessProbe } from './orchestrator/ReadinessProbe';
export type {
  OperatorCommands,
  ProcessSupervisor,
  WindowSpec,
  WindowState,
  WindowStatus,
} from './supervisor/types';
export type { Clock } from './util/Clock';
export type { CommandRunner, CommandResult } from './util/CommandRunner';

export {
  ConfigurableLoggerFactory,
  EnvironmentProvisioner,
  Orchestrator,
  SessionRegistry,
  DependencyGate,
  ProcessLauncher,
  NetworkReadinessProbe,
  ScreenSupervisor,
  TmuxSupervisor,
  NativeSupervisor,
};
