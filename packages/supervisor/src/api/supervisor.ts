/**
 * Supervisor composition
 *
 * Wires every component from one configuration object and the two
 * external collaborators.
 */

import type { SupervisorConfig } from '../config/index.js';
import { EventReader, EventWriter, eventCursorCodec } from '../events/index.js';
import type { SessionController, WorkLedger } from '../providers/index.js';
import {
  createDefaultDefinitionResolver,
  SessionLifecycle,
  type SessionDefinitionResolver,
} from '../runtime/index.js';
import {
  ActivitySignal,
  MailRouter,
  PatrolLoop,
  RestartWatch,
  SessionTaskRunner,
  ShellConditionProbe,
  TaskDispatcher,
  TriggerSource,
  type ConditionProbe,
  type TaskRunner,
} from '../services/index.js';
import { FileStateStore } from '../storage/index.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('supervisor');

/** File holding the persisted event reader offset */
export const EVENT_CURSOR_FILE = 'event-cursor.json';

export interface SupervisorDeps {
  readonly controller: SessionController;
  readonly ledger: WorkLedger;
  /** Executes dispatched tasks (default: hand them to agent sessions) */
  readonly runner?: TaskRunner;
  /** Builds session definitions (default: the configured agent command) */
  readonly definitions?: SessionDefinitionResolver;
  /** Runs condition checks (default: shell) */
  readonly probe?: ConditionProbe;
  readonly now?: () => Date;
}

export interface Supervisor {
  readonly config: SupervisorConfig;
  readonly lifecycle: SessionLifecycle;
  readonly mail: MailRouter;
  readonly dispatcher: TaskDispatcher;
  readonly patrol: PatrolLoop;
  readonly restartWatch: RestartWatch;
  readonly activity: ActivitySignal;
  readonly events: EventWriter;
  readonly reader: EventReader;
  readonly triggers: TriggerSource;
  /** Starts the patrol loop and the restart watch */
  start(): void;
  /** Stops both loops, waiting for in-flight work */
  stop(): Promise<void>;
}

export function createSupervisor(config: SupervisorConfig, deps: SupervisorDeps): Supervisor {
  const actor = config.systemActors[0] ?? 'outpost';
  const now = deps.now ?? (() => new Date());
  const definitions = deps.definitions ?? createDefaultDefinitionResolver(config);

  const events = new EventWriter(config.eventsFile);
  const reader = new EventReader(config.eventsFile, {
    systemActors: config.systemActors,
    cursorStore: new FileStateStore(config.stateDir, EVENT_CURSOR_FILE, eventCursorCodec),
  });

  const lifecycle = new SessionLifecycle({
    controller: deps.controller,
    stateDir: config.stateDir,
    sessionPrefix: config.sessionPrefix,
    lifecycle: config.lifecycle,
    actor,
    events,
    now,
  });

  const mail = new MailRouter({
    ledger: deps.ledger,
    controller: deps.controller,
    sessionPrefix: config.sessionPrefix,
  });

  const runner = deps.runner ?? new SessionTaskRunner({ lifecycle, controller: deps.controller, definitions });
  const dispatcher = new TaskDispatcher({ runner, stateDir: config.stateDir, dispatch: config.dispatch, now });
  const triggers = new TriggerSource(mail);
  const activity = new ActivitySignal(config.stateDir, now);
  const probe = deps.probe ?? new ShellConditionProbe({ cwd: config.rootDir, timeoutMs: config.dispatch.taskTimeoutMs });

  const patrol = new PatrolLoop({
    tasksDir: config.tasksDir,
    patrol: config.patrol,
    dispatcher,
    triggers,
    probe,
    actor,
    events,
    activity,
    now,
  });

  const restartWatch = new RestartWatch({ mailbox: mail, lifecycle, definitions, config: config.restartWatch });

  return {
    config,
    lifecycle,
    mail,
    dispatcher,
    patrol,
    restartWatch,
    activity,
    events,
    reader,
    triggers,
    start(): void {
      logger.info(`Supervisor starting in ${config.rootDir}`);
      patrol.start();
      restartWatch.start();
    },
    async stop(): Promise<void> {
      await Promise.all([patrol.stop(), restartWatch.stop()]);
      logger.info('Supervisor stopped');
    },
  };
}
