/**
 * Align Engine
 *
 * Walks a declared tree and its reflected counterpart top-down and drives the
 * live server toward the declaration: attributes first, then each child type
 * in registry order (delete undeclared, rename, create, recurse).
 *
 * Every mutation is gated by the confirmation provider and commits on its
 * own, so a run interrupted part-way is continued by running it again.
 *
 * @module packages/reconciler/services/AlignEngine
 */

import type { Logger } from 'pino';
import {
  attributeEquals,
  attributeNames,
  attributeSpec,
  childTypesOf,
  formatAttributeValue,
  TypeMismatchError,
  type DeclaredNode,
  type EntityType,
} from '@dbconverge/core/domain';
import {
  autoApprove,
  type IConfirmationProvider,
  type ISchemaDialect,
  type ISqlDriver,
} from '@dbconverge/core/ports';
import { ReflectedNode } from '../reflected/ReflectedNode.js';
import type { AlignReport, ReflectionContext } from '../types.js';
import { OutcomeRecorder } from './OutcomeRecorder.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Configuration for AlignEngine
 */
export interface AlignEngineConfig {
  /** Connection to the live server */
  driver: ISqlDriver;
  /** Statement renderer for the server's dialect */
  dialect: ISchemaDialect;
  /** Logger instance */
  logger: Logger;
  /** Gate for every mutation (default: approve all) */
  confirm?: IConfirmationProvider;
  /** Clock for time-derived values (default: system clock) */
  now?: () => Date;
}

export interface AlignOptions {
  /** Converge children as well as attributes (default: true) */
  recurse?: boolean;
}

// ============================================================================
// AlignEngine
// ============================================================================

/**
 * @example
 * ```typescript
 * const engine = new AlignEngine({ driver, dialect, logger, confirm: autoApprove });
 * const report = await engine.alignServer(declaredServer);
 * console.log(`${report.summary.applied} changes applied`);
 * ```
 */
export class AlignEngine {
  private readonly logger: Logger;
  private readonly context: ReflectionContext;

  constructor(config: AlignEngineConfig) {
    this.logger = config.logger.child({ component: 'AlignEngine' });
    this.context = {
      driver: config.driver,
      dialect: config.dialect,
      confirm: config.confirm ?? autoApprove,
      logger: config.logger.child({ component: 'ReflectedTree' }),
      outcomes: new OutcomeRecorder(),
      now: config.now ?? (() => new Date()),
    };
  }

  /**
   * Reflected root for the connected server, bound to this engine
   */
  async reflect(): Promise<ReflectedNode<'server'>> {
    return ReflectedNode.connect(this.context);
  }

  /**
   * Align a whole declared server with the connected one
   */
  async alignServer(declared: DeclaredNode<'server'>, options: AlignOptions = {}): Promise<AlignReport> {
    return this.align(declared, await this.reflect(), options);
  }

  /**
   * Align a declared node with its reflected counterpart.
   *
   * @returns outcomes of the gated operations this call attempted
   * @throws ReconcileError when the live server diverges from what a change verified
   */
  async align(declared: DeclaredNode, reflected: ReflectedNode, options: AlignOptions = {}): Promise<AlignReport> {
    const { recurse = true } = options;
    const recorder = reflected.context.outcomes;
    const mark = recorder.size;
    const startTime = Date.now();

    this.logger.info({ path: reflected.fullName('server') || declared.path }, 'Aligning');
    await this.alignNode(declared, reflected, recurse);

    const report = recorder.report(mark);
    this.logger.info({ ...report.summary, durationMs: Date.now() - startTime }, 'Alignment complete');
    return report;
  }

  // ==========================================================================
  // Walk
  // ==========================================================================

  private async alignNode(declared: DeclaredNode, reflected: ReflectedNode, recurse: boolean): Promise<void> {
    if (declared.type !== reflected.type) {
      throw new TypeMismatchError(reflected.fullName(), declared.type, reflected.type);
    }

    await this.alignAttributes(declared, reflected);

    if (!recurse) {
      return;
    }
    for (const childType of childTypesOf(reflected.type)) {
      await this.alignChildren(declared, reflected, childType);
    }
  }

  private async alignAttributes(declared: DeclaredNode, reflected: ReflectedNode): Promise<void> {
    const path = reflected.fullName();
    for (const name of attributeNames(reflected.type)) {
      const spec = attributeSpec(reflected.type, name);
      const wanted = declared.attribute(name);
      if (wanted === null && spec.optional) {
        continue;
      }

      const actual = await reflected.getAttribute(name);
      const equal = attributeEquals(spec, wanted, actual);
      this.logger.debug(
        { path, attribute: name, declared: formatAttributeValue(wanted), reflected: formatAttributeValue(actual), equal },
        'Compared attribute'
      );
      if (!equal) {
        await reflected.setAttribute(declared, name);
      }
    }
  }

  private async alignChildren(declared: DeclaredNode, reflected: ReflectedNode, childType: EntityType): Promise<void> {
    const wanted = declared.getChildren(childType);
    if (wanted.length === 0) {
      return;
    }

    if (!declared.ignoresExtra(childType)) {
      for (const live of await reflected.listChildren(childType)) {
        if (!(await this.isDeclared(live, wanted))) {
          await live.delete();
        }
      }
    }

    for (const child of wanted) {
      await reflected.renameChild(child);
      const live = await reflected.getOrCreateChild(child);
      if (live) {
        await this.alignNode(child, live, true);
      }
    }
  }

  private async isDeclared(live: ReflectedNode, declared: readonly DeclaredNode[]): Promise<boolean> {
    for (const candidate of declared) {
      if (await live.matches(candidate)) {
        return true;
      }
    }
    return false;
  }
}
