/**
 * chartwright command-line program
 */

import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_NAMESPACE, DEFAULT_RELEASE_NAME } from '../chart/index.js';
import type { ReleaseDriver } from '../core/driver/index.js';
import { ReleaseStateError } from '../core/errors.js';
import { KubernetesClientProvider, KubernetesReleaseDriver } from '../core/kubernetes/index.js';
import type { SchedulerOptions } from '../core/lifecycle/index.js';
import { ReleaseOperations, type ReleaseRequest } from '../operations/index.js';
import { info, printFindings, printLogs, printStatus, printUninstall, progress, success, warn } from './output.js';

const VERSION = '0.1.0';

interface ReleaseCliOptions {
  namespace: string;
  release: string;
  values: string[];
  set: string[];
  setSecret: string[];
  context?: string;
}

interface DeployCliOptions extends ReleaseCliOptions {
  timeout?: number;
  wait: boolean;
  install?: boolean;
  description?: string;
}

interface LogsCliOptions extends ReleaseCliOptions {
  tail?: number;
}

export type DriverFactory = (context: string | undefined) => ReleaseDriver;

export interface ProgramOptions {
  /** Builds the driver for cluster commands; defaults to the kubeconfig-backed driver */
  createDriver?: DriverFactory;
  env?: NodeJS.ProcessEnv;
  /** Applied over the scheduler options derived from settings */
  scheduler?: Partial<SchedulerOptions>;
  /** Throw a CommanderError instead of exiting on usage errors */
  exitOverride?: boolean;
}

export function kubernetesDriverFactory(context: string | undefined): ReleaseDriver {
  const { objectApi, coreApi } = new KubernetesClientProvider(context ? { context } : {}).getClients();
  return new KubernetesReleaseDriver({ objectApi, coreApi });
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function positiveInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError(`'${value}' is not a positive integer`);
  }
  return parsed;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const env = options.env ?? process.env;
  const createDriver = options.createDriver ?? kubernetesDriverFactory;

  const operations = (cli: ReleaseCliOptions): ReleaseOperations =>
    new ReleaseOperations({ driver: () => createDriver(cli.context), scheduler: options.scheduler });

  const request = (cli: ReleaseCliOptions): ReleaseRequest => {
    const envValues = env.VALUES_FILE ? [env.VALUES_FILE] : [];
    return {
      namespace: cli.namespace,
      releaseName: cli.release,
      valuesFiles: cli.values.length > 0 ? cli.values : envValues,
      set: cli.set,
      setSecret: cli.setSecret,
    };
  };

  const withReleaseOptions = (command: Command): Command =>
    command
      .option('-n, --namespace <namespace>', 'target namespace', env.NAMESPACE ?? DEFAULT_NAMESPACE)
      .option('-r, --release <name>', 'release name', env.RELEASE_NAME ?? DEFAULT_RELEASE_NAME)
      .option('-f, --values <file>', 'values file (repeatable, later files win)', collect, [])
      .option('--set <path=value>', 'set a value (repeatable)', collect, [])
      .option('--set-secret <path=value>', 'set a sensitive value (repeatable)', collect, [])
      .option('--context <name>', 'kubeconfig context');

  const withDeployOptions = (command: Command): Command =>
    withReleaseOptions(command)
      .option('--timeout <seconds>', 'migration and rollout timeout', positiveInteger)
      .option('--no-wait', 'do not wait for workloads to become ready')
      .option('--description <text>', 'note stored with the release record');

  const deployRequest = (cli: DeployCliOptions) => ({
    ...request(cli),
    timeoutSeconds: cli.timeout,
    wait: cli.wait,
    description: cli.description,
    progressCallback: progress,
  });

  const program = new Command();
  if (options.exitOverride) {
    // Set before the commands are added so they inherit it
    program.exitOverride();
  }
  program
    .name('chartwright')
    .version(VERSION, '-v, --version', 'display the version')
    .description('Install, upgrade and inspect the cat API release');

  withDeployOptions(program.command('install').description('install a new release')).action(
    async (cli: DeployCliOptions) => {
      const result = await operations(cli).install(deployRequest(cli));
      success(`Installed ${result.record.releaseName} revision ${result.record.revision}`);
    }
  );

  withDeployOptions(program.command('upgrade').description('upgrade a deployed release'))
    .option('-i, --install', 'install when the release does not exist')
    .action(async (cli: DeployCliOptions) => {
      const result = await operations(cli).upgrade({ ...deployRequest(cli), install: cli.install });
      success(`Upgraded ${result.record.releaseName} to revision ${result.record.revision}`);
    });

  withReleaseOptions(program.command('uninstall').description('delete every resource of a release')).action(
    async (cli: ReleaseCliOptions) => {
      const result = await operations(cli).uninstall(request(cli));
      printUninstall(result);
      if (!result.recordsDeleted) {
        throw new ReleaseStateError(
          `Uninstall of ${cli.release} was ${result.teardown.status}; release records kept`,
          cli.release,
          'teardown'
        );
      }
      success(`Uninstalled ${cli.release}`);
    }
  );

  withReleaseOptions(program.command('dry-run').description('render the manifests without applying them')).action(
    async (cli: ReleaseCliOptions) => {
      const result = await operations(cli).dryRun(request(cli));
      process.stdout.write(result.yaml);
    }
  );

  withReleaseOptions(program.command('lint').description('render the release and check it against lint rules')).action(
    async (cli: ReleaseCliOptions) => {
      const result = await operations(cli).lint(request(cli));
      printFindings(result.findings);
      if (!result.passed) {
        process.exitCode = 1;
      }
    }
  );

  withReleaseOptions(program.command('show-values').description('print the resolved settings, secrets redacted')).action(
    async (cli: ReleaseCliOptions) => {
      process.stdout.write(await operations(cli).showValues(request(cli)));
    }
  );

  withReleaseOptions(program.command('status').description('show the latest revision and resource readiness')).action(
    async (cli: ReleaseCliOptions) => {
      const result = await operations(cli).status(request(cli));
      printStatus(result);
      if (!result.ready) {
        info('Some resources are not ready yet');
      }
    }
  );

  withReleaseOptions(program.command('logs-app').description('print application pod logs'))
    .option('--tail <lines>', 'lines per container', positiveInteger)
    .action(async (cli: LogsCliOptions) => {
      printLogs(await operations(cli).logsApp({ ...request(cli), tailLines: cli.tail }));
    });

  withReleaseOptions(program.command('logs-db').description('print database pod logs'))
    .option('--tail <lines>', 'lines per container', positiveInteger)
    .action(async (cli: LogsCliOptions) => {
      const logs = await operations(cli).logsDb({ ...request(cli), tailLines: cli.tail });
      if (logs.length === 0) {
        warn('The database may be external; no bundled database pods were found');
      }
      printLogs(logs);
    });

  return program;
}
