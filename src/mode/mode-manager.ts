/**
 * Execution Mode Manager.
 *
 * Resolves which adapter strategy a run uses. The choice is made once, at
 * run start, and the strategy is handed to every stage; stages never look
 * at the mode themselves.
 */

import { ConfigurationError } from '../domain/errors';
import { ExecutionMode } from '../domain/run';
import { AdapterStrategy } from '../invocation/types';
import { MockFixtures, MockStrategy, loadMockFixtures } from './mock-strategy';

export interface ResolveContext {
  /** The audited project. */
  projectId: string;
}

export interface ExecutionModeManagerOptions {
  /** Builds the live strategy; called only when a live run starts. */
  live?: (context: ResolveContext) => AdapterStrategy;
  /** Preloaded fixtures, or a directory to load them from. */
  fixtures?: MockFixtures | string;
}

export class ExecutionModeManager {
  private fixtures?: MockFixtures;

  constructor(private readonly options: ExecutionModeManagerOptions = {}) {}

  resolve(mode: ExecutionMode, context: ResolveContext): AdapterStrategy {
    switch (mode) {
      case 'mock':
        return new MockStrategy(this.loadFixtures(), context.projectId);
      case 'live': {
        if (!this.options.live) {
          throw new ConfigurationError('Live mode is not available: no live adapter configured');
        }
        return this.options.live(context);
      }
    }
  }

  private loadFixtures(): MockFixtures {
    if (!this.fixtures) {
      const source = this.options.fixtures;
      this.fixtures = typeof source === 'object' ? source : loadMockFixtures(source);
    }
    return this.fixtures;
  }
}
