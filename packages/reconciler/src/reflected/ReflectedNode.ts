/**
 * Reflected Node
 *
 * Live-bound handle to one object on the server. Attributes load lazily: the
 * first read fetches the node's detail row once, each attribute is derived
 * from it and cached until reset. Every mutation goes through the
 * confirmation provider, commits on its own, and is verified against a fresh
 * read.
 *
 * @module packages/reconciler/reflected/ReflectedNode
 */

import {
  attributeEquals,
  attributeSpec,
  childTypesOf,
  coerceAttributeValue,
  ENTITY_LABELS,
  formatAttributeValue,
  isChildTypeOf,
  AttributeNotAlteredError,
  AttributeUnreadableError,
  CreateNotVerifiedError,
  DetailNotFoundError,
  InvalidChildError,
  ObjectNotFoundError,
  RenameNotVerifiedError,
  type AttributeName,
  type AttributeValue,
  type DeclaredNode,
  type EntityType,
} from '@dbconverge/core/domain';
import type { ExecuteOptions, Row, SqlStatement } from '@dbconverge/core/ports';
import type { AlignOperation, AlignOutcome, OutcomeStatus, ReflectionContext } from '../types.js';
import type { EntityBehavior } from './EntityBehavior.js';
import { behaviorOf } from './behaviors/index.js';
import { textField } from './rows.js';

type OutcomeExtras = Pick<AlignOutcome, 'attribute' | 'from' | 'to' | 'reason'>;

export class ReflectedNode<T extends EntityType = EntityType> {
  readonly type: T;
  readonly parent: ReflectedNode | null;
  readonly context: ReflectionContext;

  private currentName: string;
  private detail: Row | null = null;
  private readonly cache = new Map<string, AttributeValue>();

  constructor(type: T, name: string, parentOrContext: ReflectedNode | ReflectionContext) {
    this.type = type;
    this.currentName = name;
    if (parentOrContext instanceof ReflectedNode) {
      this.parent = parentOrContext;
      this.context = parentOrContext.context;
    } else {
      this.parent = null;
      this.context = parentOrContext;
    }
  }

  /**
   * Root node for the server the driver is connected to
   */
  static async connect(context: ReflectionContext): Promise<ReflectedNode<'server'>> {
    const { rows } = await context.driver.execute(context.dialect.serverName());
    return new ReflectedNode('server', textField(rows[0], 'name') ?? '', context);
  }

  get name(): string {
    return this.currentName;
  }

  get label(): string {
    return ENTITY_LABELS[this.type];
  }

  is<C extends EntityType>(type: C): this is ReflectedNode<C> {
    return this.type === type;
  }

  // ===========================================================================
  // Hierarchy
  // ===========================================================================

  /**
   * Nearest node of the type, starting with this one
   */
  ancestor<A extends EntityType>(type: A): ReflectedNode<A> | null {
    let node: ReflectedNode | null = this;
    while (node) {
      if (node.is(type)) {
        return node;
      }
      node = node.parent;
    }
    return null;
  }

  /**
   * @throws ObjectNotFoundError when no ancestor has the type
   */
  requireAncestor<A extends EntityType>(type: A): ReflectedNode<A> {
    const node = this.ancestor(type);
    if (!node) {
      throw new ObjectNotFoundError(this.fullName('server'), `${ENTITY_LABELS[type]} ancestor of ${this.describe()}`);
    }
    return node;
  }

  /**
   * Dotted name from the given ancestor type (or the root) down to this node
   */
  fullName(maxAncestor: EntityType = 'database'): string {
    const names: string[] = [];
    let node: ReflectedNode | null = this;
    while (node) {
      names.unshift(node.name);
      if (node.type === maxAncestor) {
        break;
      }
      node = node.parent;
    }
    return names.filter((name) => name.length > 0).join('.');
  }

  describe(): string {
    return `${this.label} ${this.fullName()}`;
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * Run a statement in the context of the nearest database, unless the
   * options name another one.
   */
  async execute(statement: SqlStatement, options: ExecuteOptions = {}): Promise<readonly Row[]> {
    const database = options.database ?? this.ancestor('database')?.name;
    const result = await this.context.driver.execute(statement, database ? { database } : {});
    return result.rows;
  }

  async firstRow(statement: SqlStatement, options?: ExecuteOptions): Promise<Row | undefined> {
    const rows = await this.execute(statement, options);
    return rows[0];
  }

  async exists(statement: SqlStatement, options?: ExecuteOptions): Promise<boolean> {
    return (await this.firstRow(statement, options)) !== undefined;
  }

  // ===========================================================================
  // Attributes
  // ===========================================================================

  /**
   * Detail row of this node, fetched once until reset
   *
   * @throws DetailNotFoundError when the object no longer exists
   */
  async getDetail(): Promise<Row> {
    if (this.detail === null) {
      const detail = await this.behavior().fetchDetail(this);
      if (!detail) {
        throw new DetailNotFoundError(this.fullName());
      }
      this.detail = detail;
    }
    return this.detail;
  }

  async getAttribute(name: AttributeName<T>): Promise<AttributeValue> {
    const cached = this.cache.get(name);
    if (cached !== undefined) {
      return cached;
    }
    const detail = await this.getDetail();
    const value = await this.readAttribute(detail, name);
    this.cache.set(name, value);
    return value;
  }

  resetAttribute(name: AttributeName<T>): void {
    this.detail = null;
    this.cache.delete(name);
  }

  resetAllAttributes(): void {
    this.detail = null;
    this.cache.clear();
  }

  private async readAttribute(detail: Row, name: AttributeName<T>): Promise<AttributeValue> {
    const reader = this.behavior().readers?.[name];
    if (reader) {
      return reader(this, detail);
    }
    if (!(name in detail)) {
      throw new AttributeUnreadableError(this.fullName(), name, 'no reader and no detail field');
    }
    const value = coerceAttributeValue(attributeSpec(this.type, name).kind, detail[name]);
    if (value === undefined) {
      throw new AttributeUnreadableError(this.fullName(), name, `unexpected value ${String(detail[name])}`);
    }
    return value;
  }

  /**
   * Change one attribute to its declared value and verify the change.
   *
   * @throws AttributeNotAlteredError when the re-read value differs from the declared one
   */
  async setAttribute(declared: DeclaredNode<T>, name: AttributeName<T>): Promise<OutcomeStatus> {
    const spec = attributeSpec(this.type, name);
    const path = this.fullName();
    const target = declared.attribute(name);
    const from = formatAttributeValue(await this.getAttribute(name));
    const to = formatAttributeValue(target);
    const extras = { attribute: name, from, to };

    this.context.logger.info({ path, attribute: name, from, to }, 'Attribute differs from declaration');

    const setter = this.behavior().setters?.[name];
    if (!setter) {
      this.context.logger.warn({ path, attribute: name }, 'No remediation for attribute');
      return this.record('update', 'unsupported', { ...extras, reason: 'no remediation for attribute' });
    }

    if (!(await this.context.confirm.confirm(`Set ${this.describe()} "${name}" from ${from} to ${to}?`))) {
      return this.record('update', 'declined', extras);
    }

    const result = await setter(this, declared);
    if (result.status === 'skipped') {
      this.context.logger.warn({ path, attribute: name, reason: result.reason }, 'Attribute change skipped');
      return this.record('update', 'skipped', { ...extras, reason: result.reason });
    }

    await this.context.driver.commit();
    this.resetAllAttributes();
    const actual = await this.getAttribute(name);
    if (!attributeEquals(spec, target, actual)) {
      throw new AttributeNotAlteredError(path, name, to, formatAttributeValue(actual));
    }
    return this.record('update', 'applied', extras);
  }

  // ===========================================================================
  // Matching, rename and delete
  // ===========================================================================

  /**
   * Whether this live node is the counterpart of a declared node
   */
  async matches(declared: DeclaredNode): Promise<boolean> {
    if (!declared.is(this.type)) {
      return false;
    }
    const behavior = this.behavior();
    if (behavior.matches) {
      return behavior.matches(this, declared);
    }
    const name = this.name.toLowerCase();
    return name === declared.name.toLowerCase() || (declared.oldName !== null && name === declared.oldName.toLowerCase());
  }

  /**
   * @throws RenameNotVerifiedError when the new name does not resolve afterwards
   */
  async rename(newName: string): Promise<OutcomeStatus> {
    const path = this.fullName();
    const behavior = this.behavior();
    const extras = { from: this.name, to: newName };

    this.context.logger.info({ path, to: newName }, 'Renaming');

    if (!behavior.rename) {
      this.context.logger.warn({ path }, `${this.label} rename is not supported`);
      return this.record('rename', 'unsupported', { ...extras, reason: `${this.label} rename is not supported` });
    }
    if (!(await this.context.confirm.confirm(`Rename ${this.describe()} to "${newName}"?`))) {
      return this.record('rename', 'declined', extras);
    }

    await behavior.rename(this, newName);
    await this.context.driver.commit();
    if (!this.parent || !(await behavior.nameExists(this.parent, newName))) {
      throw new RenameNotVerifiedError(path, newName);
    }
    this.currentName = newName;
    return this.record('rename', 'applied', extras);
  }

  /**
   * Delete the live object unless policy or confirmation declines.
   *
   * @returns whether the object was deleted
   */
  async delete(): Promise<boolean> {
    const path = this.fullName();
    const behavior = this.behavior();

    const refusal = behavior.deleteRefusal?.(this) ?? null;
    if (refusal) {
      this.context.logger.info({ path, reason: refusal }, 'Delete not allowed');
      this.record('delete', 'refused', { reason: refusal });
      return false;
    }
    if (!behavior.remove) {
      this.context.logger.warn({ path }, `${this.label} delete is not supported`);
      this.record('delete', 'unsupported', { reason: `${this.label} delete is not supported` });
      return false;
    }

    this.context.logger.info({ path }, 'Deleting undeclared object');
    if (!(await this.context.confirm.confirm(`Delete ${this.describe()}?`))) {
      this.record('delete', 'declined', {});
      return false;
    }

    const result = await behavior.remove(this);
    if (result.status === 'skipped') {
      this.context.logger.warn({ path, reason: result.reason }, 'Delete skipped');
      this.record('delete', 'skipped', { reason: result.reason });
      return false;
    }
    await this.context.driver.commit();
    this.record('delete', 'applied', {});
    return true;
  }

  // ===========================================================================
  // Children
  // ===========================================================================

  /**
   * Every live child of the type, system objects excluded
   */
  async listChildren<C extends EntityType>(type: C): Promise<ReflectedNode<C>[]> {
    const behavior = this.childBehavior(type);
    const system = new Set(behavior.systemNames.map((name) => name.toLowerCase()));
    const names = await behavior.listNames(this);
    return names.filter((name) => !system.has(name.toLowerCase())).map((name) => new ReflectedNode(type, name, this));
  }

  async getChild<C extends EntityType>(type: C, name: string): Promise<ReflectedNode<C> | null> {
    const behavior = this.childBehavior(type);
    if (!name || !(await behavior.nameExists(this, name))) {
      return null;
    }
    return new ReflectedNode(type, name, this);
  }

  /**
   * Live counterpart of a declared child, by the type's matching rule
   */
  async findChild<C extends EntityType>(declared: DeclaredNode<C>): Promise<ReflectedNode<C> | null> {
    const behavior = this.childBehavior(declared.type);
    let name: string | null;
    if (behavior.fromDeclared) {
      name = await behavior.fromDeclared(this, declared);
    } else {
      name = declared.name && (await behavior.nameExists(this, declared.name)) ? declared.name : null;
    }
    return name === null ? null : new ReflectedNode(declared.type, name, this);
  }

  /**
   * Find the counterpart of a declared child, creating it when the type allows.
   *
   * @returns the counterpart, or null when it was not created
   * @throws CreateNotVerifiedError when a created object cannot be matched
   */
  async getOrCreateChild<C extends EntityType>(declared: DeclaredNode<C>): Promise<ReflectedNode<C> | null> {
    const existing = await this.findChild(declared);
    if (existing) {
      return existing;
    }

    const behavior = this.childBehavior(declared.type);
    const label = ENTITY_LABELS[declared.type];
    const path = [this.fullName(), declared.name].filter((part) => part.length > 0).join('.');

    if (!behavior.creatable || !behavior.create) {
      this.context.logger.info({ path }, `${label} cannot be created`);
      this.recordFor(declared.type, path, 'create', 'refused', { reason: `${label} cannot be created` });
      return null;
    }

    this.context.logger.info({ path }, `Creating ${label}`);
    if (!(await this.context.confirm.confirm(`Create ${label} ${path}?`))) {
      this.recordFor(declared.type, path, 'create', 'declined', {});
      return null;
    }

    await behavior.create(this, declared);
    await this.context.driver.commit();
    const created = await this.findChild(declared);
    if (!created) {
      throw new CreateNotVerifiedError(path);
    }
    this.recordFor(declared.type, path, 'create', 'applied', {});
    return created;
  }

  /**
   * Rename the live child still carrying the declared old name, if any
   */
  async renameChild(declared: DeclaredNode): Promise<void> {
    if (!declared.oldName) {
      return;
    }
    const child = await this.getChild(declared.type, declared.oldName);
    if (!child) {
      this.context.logger.debug({ path: this.fullName(), oldName: declared.oldName }, 'No child under old name');
      return;
    }
    await child.rename(declared.name);
  }

  // ===========================================================================
  // Server
  // ===========================================================================

  /**
   * Database the connection is using
   */
  async currentDatabase(): Promise<ReflectedNode<'database'>> {
    const server = this.requireAncestor('server');
    const name = textField(await server.firstRow(this.context.dialect.currentDatabase()), 'db_name') ?? '';
    const database = await server.getChild('database', name);
    if (!database) {
      throw new ObjectNotFoundError(server.fullName(), `Database "${name}"`);
    }
    return database;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private behavior(): EntityBehavior<T> {
    return behaviorOf(this.type);
  }

  private childBehavior<C extends EntityType>(type: C): EntityBehavior<C> {
    if (!isChildTypeOf(this.type, type)) {
      throw new InvalidChildError(this.type, type, childTypesOf(this.type));
    }
    return behaviorOf(type);
  }

  private record(operation: AlignOperation, status: OutcomeStatus, extras: OutcomeExtras): OutcomeStatus {
    return this.recordFor(this.type, this.fullName(), operation, status, extras);
  }

  private recordFor(
    entityType: EntityType,
    path: string,
    operation: AlignOperation,
    status: OutcomeStatus,
    extras: OutcomeExtras
  ): OutcomeStatus {
    this.context.outcomes.record({ operation, entityType, path, status, ...extras });
    return status;
  }
}
