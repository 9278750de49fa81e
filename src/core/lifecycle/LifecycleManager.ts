import { inject, injectable } from 'inversify';
import { SERVICE_IDENTIFIERS } from '../container/identifiers';
import { ConfigStore } from '../config/ConfigStore';
import { HandleGraph } from '../graph/HandleGraph';
import { ObjectGraphBuilder } from '../graph/ObjectGraphBuilder';
import type { FixtureSettings } from '../../config';
import type { Handle } from '../../handles/types';
import type { Section } from '../../types/section';
import {
  FailedAttempt,
  FixtureClosedError,
  TeardownError,
  describeError,
  toError
} from '../../utils/errors';
import type { Logger } from '../../utils/logger';

export type FixtureState = 'empty' | 'loaded' | 'closed';

export type ScopeBody<T> = (manager: LifecycleManager, handles: readonly Handle[]) => T;

/**
 * Owns the handle graph of one fixture.
 *
 *   empty --rebuild ok--> loaded --teardown / failed rebuild--> empty
 *   any --close--> closed (terminal)
 */
@injectable()
export class LifecycleManager {
  private current: HandleGraph = HandleGraph.empty();
  private currentState: FixtureState = 'empty';
  private teardownFailures: readonly FailedAttempt[] = [];
  private readonly logger: Logger;

  constructor(
    @inject(SERVICE_IDENTIFIERS.CONFIG_STORE) private readonly store: ConfigStore,
    @inject(SERVICE_IDENTIFIERS.GRAPH_BUILDER) private readonly builder: ObjectGraphBuilder,
    @inject(SERVICE_IDENTIFIERS.SETTINGS) private readonly settings: FixtureSettings,
    @inject(SERVICE_IDENTIFIERS.LOGGER) logger: Logger
  ) {
    this.logger = logger.child('lifecycle');
  }

  get state(): FixtureState {
    return this.currentState;
  }

  get graph(): HandleGraph {
    return this.current;
  }

  get handles(): readonly Handle[] {
    return this.current.handles;
  }

  get configStore(): ConfigStore {
    return this.store;
  }

  /**
   * Failures of the most recent graph teardown, empty when every handle
   * closed cleanly. `rebuild` only logs them, so callers read them here.
   */
  get lastTeardownFailures(): readonly FailedAttempt[] {
    return this.teardownFailures;
  }

  /**
   * Tears down the current graph, merges `sections` in order and builds a new
   * graph from the whole merged configuration. A failed build leaves the
   * manager empty; the merge stays in place for a corrective follow-up.
   * The merged configuration survives this internal teardown whatever
   * `clearConfigOnTeardown` says.
   */
  rebuild(...sections: Section[]): HandleGraph {
    this.assertOpen('rebuild');

    try {
      this.releaseGraph();
    } catch (error) {
      this.logger.warn('Previous graph did not tear down cleanly', { error: describeError(error) });
    }

    sections.forEach(section => this.store.merge(section));

    // a failed build leaves no partial graph behind
    const graph = this.builder.build(this.store.root);
    this.current = graph;
    this.currentState = 'loaded';

    this.logger.info('Fixture graph loaded', { devices: graph.names() });
    return graph;
  }

  /**
   * Best-effort: every top-level handle gets exactly one `closeAll`, and the
   * graph is empty afterwards even when some of them failed. Also forgets the
   * merged configuration when `clearConfigOnTeardown` is set.
   */
  teardown(): void {
    try {
      this.releaseGraph();
    } finally {
      if (this.settings.clearConfigOnTeardown) {
        this.store.clear();
      }
    }
  }

  /** Tears down and makes the manager terminal; later rebuilds are refused. */
  close(): void {
    if (this.currentState === 'closed') {
      return;
    }

    try {
      this.teardown();
    } finally {
      this.currentState = 'closed';
      this.logger.debug('Fixture closed');
    }
  }

  /**
   * Runs `body` with the manager and its handles, then tears down exactly once.
   * The body's own failure wins over a teardown failure.
   */
  withScope<T>(body: ScopeBody<T>): T {
    this.assertOpen('enter scope');

    let result: T;
    try {
      result = body(this, this.current.handles);
    } catch (error) {
      try {
        this.teardown();
      } catch (teardownError) {
        this.logger.error('Teardown after failed scope also failed', {
          error: describeError(teardownError)
        });
      }
      throw error;
    }

    this.teardown();
    return result;
  }

  private releaseGraph(): void {
    if (this.currentState !== 'loaded') {
      return;
    }

    this.logger.debug('Tearing down', { devices: this.current.names() });

    const failures: FailedAttempt[] = [];
    for (const handle of this.current.handles) {
      try {
        handle.closeAll();
      } catch (error) {
        failures.push({ device: handle.name, error: toError(error) });
      }
    }

    this.current = HandleGraph.empty();
    this.currentState = 'empty';
    this.teardownFailures = failures;

    if (failures.length > 0) {
      throw new TeardownError(failures);
    }
  }

  private assertOpen(operation: string): void {
    if (this.currentState === 'closed') {
      throw new FixtureClosedError(operation);
    }
  }
}
