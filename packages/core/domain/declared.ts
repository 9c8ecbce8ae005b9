/**
 * Declared Tree
 *
 * In-memory description of the desired schema: typed nodes, each owning typed
 * children and exactly the attribute set the registry names for its type.
 * Built once before an alignment run and only read afterwards.
 *
 * @module packages/core/domain/declared
 */

import { win32 } from 'node:path';
import {
  attributeSpecs,
  type AttributeKind,
  type AttributeName,
  type AttributeValue,
  type AttributeValues,
} from './attributes.js';
import {
  childTypesOf,
  ENTITY_LABELS,
  isChildTypeOf,
  SINGLETON_CHILD_TYPES,
  type EntityType,
} from './entity-types.js';
import {
  AttributeSetError,
  ChildNotFoundError,
  DeclarationError,
  DuplicateChildError,
  ErrorCodes,
  InvalidChildError,
} from './errors.js';
import { asNames, asText } from './values.js';

export const MAX_NAME_LENGTH = 128;

// =============================================================================
// Types
// =============================================================================

/**
 * Which undeclared live children survive alignment.
 *
 * - `'none'`: every undeclared child of a declared type is deleted
 * - `'all'`: no undeclared child is deleted
 * - a set of child types: undeclared children of those types are kept
 */
export type IgnoreExtraChildren = 'none' | 'all' | ReadonlySet<EntityType>;

export type IgnoreExtraChildrenInput = IgnoreExtraChildren | boolean | readonly EntityType[];

export interface DeclaredNodeInit<T extends EntityType> {
  readonly name: string;
  readonly oldName?: string | null;
  readonly ignoreExtraChildren?: IgnoreExtraChildrenInput;
  readonly attributes: AttributeValues<T>;
  readonly children?: readonly DeclaredNode[];
}

// =============================================================================
// Declared Node
// =============================================================================

export class DeclaredNode<T extends EntityType = EntityType> {
  readonly type: T;
  readonly name: string;
  /** Prior name of the object, signalling a pending rename */
  readonly oldName: string | null;
  readonly ignoreExtraChildren: IgnoreExtraChildren;

  private readonly values: ReadonlyMap<string, AttributeValue>;
  private readonly children = new Map<EntityType, DeclaredNode[]>();
  private parentNode: DeclaredNode | null = null;

  constructor(type: T, init: DeclaredNodeInit<T>) {
    this.type = type;
    this.name = init.name.slice(0, MAX_NAME_LENGTH);
    this.oldName = init.oldName ? init.oldName.slice(0, MAX_NAME_LENGTH) : null;
    this.ignoreExtraChildren = normalizeIgnore(init.ignoreExtraChildren);
    this.values = validateAttributes(type, init.attributes);

    for (const child of init.children ?? []) {
      this.addChild(child);
    }
  }

  get parent(): DeclaredNode | null {
    return this.parentNode;
  }

  /**
   * Dotted path from the root, for diagnostics
   */
  get path(): string {
    const names: string[] = [];
    for (let node: DeclaredNode | null = this; node; node = node.parent) {
      if (node.name) {
        names.unshift(node.name);
      }
    }
    return names.length > 0 ? names.join('.') : ENTITY_LABELS[this.type].toLowerCase();
  }

  attribute(name: AttributeName<T>): AttributeValue {
    const value = this.values.get(name);
    return value === undefined ? null : value;
  }

  attributeEntries(): [string, AttributeValue][] {
    return [...this.values.entries()];
  }

  /**
   * Add a child, validating its type and uniqueness among its siblings.
   *
   * @throws InvalidChildError when the parent type does not accept the child type
   * @throws DuplicateChildError when a sibling of the same type has the same identity
   */
  addChild(child: DeclaredNode): this {
    if (!isChildTypeOf(this.type, child.type)) {
      throw new InvalidChildError(this.type, child.type, childTypesOf(this.type));
    }

    const siblings = this.children.get(child.type) ?? [];
    if (SINGLETON_CHILD_TYPES.has(child.type) && siblings.length > 0) {
      throw new DuplicateChildError(this.path, child.type, identityKey(child));
    }
    const key = identityKey(child);
    if (siblings.some((sibling) => identityKey(sibling) === key)) {
      throw new DuplicateChildError(this.path, child.type, key);
    }

    siblings.push(child);
    this.children.set(child.type, siblings);
    child.parentNode = this;
    return this;
  }

  /**
   * Declared children of one type, in declaration order
   */
  getChildren<C extends EntityType>(type: C): DeclaredNode<C>[] {
    return (this.children.get(type) ?? []).filter((child): child is DeclaredNode<C> => child.type === type);
  }

  hasChildren(type: EntityType): boolean {
    return (this.children.get(type) ?? []).length > 0;
  }

  /**
   * @throws ChildNotFoundError when no child of the type has the name
   */
  getChild<C extends EntityType>(type: C, name: string): DeclaredNode<C> {
    const wanted = name.toLowerCase();
    const child = this.getChildren(type).find((candidate) => candidate.name.toLowerCase() === wanted);
    if (!child) {
      throw new ChildNotFoundError(this.path, name, type);
    }
    return child;
  }

  /**
   * Resolve a chain of names into a descendant, trying every allowed child
   * type at each step.
   */
  resolve(...names: string[]): DeclaredNode {
    const [first, ...rest] = names;
    if (first === undefined) {
      return this;
    }
    const wanted = first.toLowerCase();
    for (const type of childTypesOf(this.type)) {
      const child = this.getChildren(type).find((candidate) => candidate.name.toLowerCase() === wanted);
      if (child) {
        return child.resolve(...rest);
      }
    }
    throw new ChildNotFoundError(this.path, first);
  }

  ignoresExtra(childType: EntityType): boolean {
    if (this.ignoreExtraChildren === 'all') {
      return true;
    }
    if (this.ignoreExtraChildren === 'none') {
      return false;
    }
    return this.ignoreExtraChildren.has(childType);
  }

  is<C extends EntityType>(type: C): this is DeclaredNode<C> {
    return this.type === type;
  }

  toString(): string {
    return `${ENTITY_LABELS[this.type]}: ${this.name}`;
  }
}

/**
 * A column declaration that may also ask for a primary key on itself
 */
export class DeclaredColumn extends DeclaredNode<'column'> {
  readonly primaryKey: boolean;

  constructor(init: DeclaredNodeInit<'column'> & { primaryKey?: boolean }) {
    super('column', init);
    this.primaryKey = init.primaryKey ?? false;
  }
}

// =============================================================================
// Identity and validation
// =============================================================================

/**
 * Key two siblings of one type must not share; follows the type's matching rule.
 */
export function identityKey(node: DeclaredNode): string {
  const text = (value: AttributeValue): string => (asText(value) ?? '').toLowerCase();
  const names = (value: AttributeValue): string => asNames(value).map((n) => n.toLowerCase()).join(',');

  if (node.is('index') || node.is('primary_key')) {
    return `(${names(node.attribute('columns'))})`;
  }
  if (node.is('foreign_key')) {
    return [
      text(node.attribute('column')),
      text(node.attribute('foreign_schema')),
      text(node.attribute('foreign_table')),
      text(node.attribute('foreign_column')),
    ].join('|');
  }
  if (node.is('partition')) {
    return text(node.attribute('column'));
  }
  if (node.is('user')) {
    const login = asText(node.attribute('login_name'));
    return (login ?? node.name).toLowerCase();
  }
  return node.name.toLowerCase();
}

function normalizeIgnore(input: IgnoreExtraChildrenInput | undefined): IgnoreExtraChildren {
  if (input === undefined || input === false || input === 'none') {
    return 'none';
  }
  if (input === true || input === 'all') {
    return 'all';
  }
  return new Set(input);
}

function kindMismatch(kind: AttributeKind, value: AttributeValue): boolean {
  switch (kind) {
    case 'text':
    case 'path':
      return typeof value !== 'string';
    case 'integer':
      return typeof value !== 'number' || !Number.isInteger(value);
    case 'boolean':
      return typeof value !== 'boolean';
    case 'ordered':
      return !Array.isArray(value);
    case 'set':
      return !Array.isArray(value) && !(value instanceof Set);
  }
}

function validateAttributes(
  type: EntityType,
  given: Readonly<Record<string, AttributeValue>>
): Map<string, AttributeValue> {
  const specs = attributeSpecs(type);
  const expected = new Set(specs.map((spec) => spec.name));
  const missing = specs.filter((spec) => !(spec.name in given)).map((spec) => spec.name);
  const unexpected = Object.keys(given).filter((name) => !expected.has(name));
  if (missing.length > 0 || unexpected.length > 0) {
    throw new AttributeSetError(type, missing, unexpected);
  }

  const values = new Map<string, AttributeValue>();
  for (const spec of specs) {
    const value = given[spec.name] ?? null;
    if (value !== null && kindMismatch(spec.kind, value)) {
      throw new DeclarationError(`Attribute "${spec.name}" of ${type} must be ${spec.kind}`, {
        code: ErrorCodes.DECLARATION_INVALID_VALUE,
      });
    }
    values.set(spec.name, spec.kind === 'set' && value !== null ? new Set(asNames(value)) : value);
  }
  return values;
}

// =============================================================================
// Column builders
// =============================================================================

export interface ColumnOptions {
  identity?: boolean;
  nullable?: boolean;
  charMaxLen?: number | null;
  datetimePrecision?: number | null;
  numericPrecision?: number | null;
  numericScale?: number | null;
  oldName?: string;
  /** Declare a primary key on this column when the table declares none */
  primaryKey?: boolean;
}

export function column(name: string, dataType: string, options: ColumnOptions = {}): DeclaredColumn {
  return new DeclaredColumn({
    name,
    oldName: options.oldName,
    primaryKey: options.primaryKey,
    attributes: {
      data_type: dataType.toLowerCase(),
      char_max_len: options.charMaxLen ?? null,
      datetime_precision: options.datetimePrecision ?? null,
      numeric_precision: options.numericPrecision ?? null,
      numeric_scale: options.numericScale ?? null,
      nullable: options.nullable ?? false,
      identity: options.identity ?? false,
    },
  });
}

type ColumnExtras = Omit<ColumnOptions, 'charMaxLen' | 'datetimePrecision' | 'numericPrecision' | 'numericScale'>;

export function integerColumn(name: string, options: ColumnExtras = {}): DeclaredColumn {
  return column(name, 'int', options);
}

/**
 * Small floats take 4 bytes, large ones 8
 */
export function floatColumn(name: string, options: ColumnExtras & { small?: boolean } = {}): DeclaredColumn {
  return column(name, 'float', { ...options, numericPrecision: options.small ? 24 : 53 });
}

export function varcharColumn(name: string, charMaxLen: number, options: ColumnExtras = {}): DeclaredColumn {
  return column(name, 'varchar', { ...options, charMaxLen });
}

export function dateColumn(name: string, options: ColumnExtras = {}): DeclaredColumn {
  return column(name, 'date', options);
}

export function dateTimeColumn(
  name: string,
  options: ColumnExtras & { datetimePrecision?: number } = {}
): DeclaredColumn {
  return column(name, 'datetime2', { ...options, datetimePrecision: options.datetimePrecision ?? 7 });
}

export function identityColumn(
  name: string,
  options: Omit<ColumnExtras, 'identity' | 'nullable'> = {}
): DeclaredColumn {
  return column(name, 'int', { ...options, identity: true, nullable: false });
}

export function numericColumn(
  name: string,
  numericPrecision: number,
  numericScale: number,
  options: ColumnExtras = {}
): DeclaredColumn {
  if (numericScale >= numericPrecision) {
    throw new DeclarationError(`Numeric column "${name}": scale must be less than precision`);
  }
  return column(name, 'numeric', { ...options, numericPrecision, numericScale });
}

// =============================================================================
// Key, index and partition builders
// =============================================================================

function keyColumns(columns: string | readonly string[]): string[] {
  return (typeof columns === 'string' ? [columns] : [...columns]).map((name) => name.toLowerCase());
}

export interface PrimaryKeyOptions {
  name?: string;
  clustered?: boolean;
  compression?: string;
}

export function primaryKey(
  columns: string | readonly string[],
  options: PrimaryKeyOptions = {}
): DeclaredNode<'primary_key'> {
  const cols = keyColumns(columns);
  return new DeclaredNode('primary_key', {
    name: options.name ?? ['PK', ...cols].join('_'),
    attributes: {
      columns: cols,
      clustered: options.clustered ?? true,
      compression: options.compression ?? 'NONE',
    },
  });
}

export interface IndexOptions {
  name?: string;
  oldName?: string;
  clustered?: boolean;
  unique?: boolean;
  compression?: string;
  includedColumns?: readonly string[];
}

export function index(columns: string | readonly string[], options: IndexOptions = {}): DeclaredNode<'index'> {
  const cols = keyColumns(columns);
  const included = (options.includedColumns ?? []).map((name) => name.toLowerCase());
  let name = options.name;
  if (!name) {
    name = ['IX', ...cols].join('_');
    if (included.length > 0) {
      name += `__${included.join('_')}`;
    }
  }
  return new DeclaredNode('index', {
    name,
    oldName: options.oldName,
    attributes: {
      columns: cols,
      clustered: options.clustered ?? false,
      compression: options.compression ?? 'NONE',
      included_columns: included.length > 0 ? new Set(included) : null,
      unique: options.unique ?? false,
    },
  });
}

export interface ForeignKeyInit {
  column: string;
  foreignTable: string;
  foreignColumn: string;
  foreignSchema?: string;
}

export function foreignKey(init: ForeignKeyInit): DeclaredNode<'foreign_key'> {
  const foreignSchema = init.foreignSchema ?? 'dbo';
  return new DeclaredNode('foreign_key', {
    name: `FK_${init.column}_${foreignSchema}_${init.foreignTable}_${init.foreignColumn}`,
    attributes: {
      foreign_schema: foreignSchema,
      foreign_table: init.foreignTable,
      foreign_column: init.foreignColumn,
      column: init.column,
    },
  });
}

/**
 * Daily range partition on a datetime column
 */
export function partition(columnName: string): DeclaredNode<'partition'> {
  const name = columnName.toLowerCase();
  return new DeclaredNode('partition', { name, attributes: { column: name } });
}

// =============================================================================
// Container builders
// =============================================================================

interface ContainerInit {
  name: string;
  oldName?: string;
  ignoreExtraChildren?: IgnoreExtraChildrenInput;
}

export interface TableInit extends ContainerInit {
  columns?: readonly DeclaredNode<'column'>[];
  primaryKey?: DeclaredNode<'primary_key'>;
  indexes?: readonly DeclaredNode<'index'>[];
  partition?: DeclaredNode<'partition'>;
  foreignKeys?: readonly DeclaredNode<'foreign_key'>[];
}

export function table(init: TableInit): DeclaredNode<'table'> {
  const columns = init.columns ?? [];
  let key = init.primaryKey;
  if (!key) {
    const flagged = columns.filter((col) => col instanceof DeclaredColumn && col.primaryKey).map((col) => col.name);
    if (flagged.length > 0) {
      key = primaryKey(flagged);
    }
  }

  const children: DeclaredNode[] = [...columns];
  if (key) {
    children.push(key);
  }
  children.push(...(init.indexes ?? []));
  if (init.partition) {
    children.push(init.partition);
  }
  children.push(...(init.foreignKeys ?? []));

  return new DeclaredNode('table', {
    name: init.name,
    oldName: init.oldName,
    ignoreExtraChildren: init.ignoreExtraChildren,
    attributes: {},
    children,
  });
}

export interface SchemaInit extends ContainerInit {
  tables?: readonly DeclaredNode<'table'>[];
}

export function schema(init: SchemaInit): DeclaredNode<'schema'> {
  return new DeclaredNode('schema', {
    name: init.name,
    oldName: init.oldName,
    ignoreExtraChildren: init.ignoreExtraChildren,
    attributes: {},
    children: init.tables,
  });
}

export interface LoginOptions {
  oldName?: string;
  typeDesc?: string;
  serverRoles?: readonly string[];
}

export function login(name: string, options: LoginOptions = {}): DeclaredNode<'login'> {
  return new DeclaredNode('login', {
    name,
    oldName: options.oldName,
    attributes: {
      type_desc: options.typeDesc ?? 'SQL_LOGIN',
      server_roles: new Set(options.serverRoles ?? []),
    },
  });
}

export interface UserOptions {
  oldName?: string;
  dbRoles?: readonly string[];
}

export function user(name: string, loginName: string, options: UserOptions = {}): DeclaredNode<'user'> {
  return new DeclaredNode('user', {
    name,
    oldName: options.oldName,
    attributes: {
      login_name: loginName,
      db_roles: new Set(options.dbRoles ?? []),
    },
  });
}

/**
 * User named after the login it maps to
 */
export function userForLogin(loginNode: DeclaredNode<'login'>, options: UserOptions = {}): DeclaredNode<'user'> {
  return user(loginNode.name, loginNode.name, options);
}

export const RECOVERY_MODELS = ['FULL', 'SIMPLE', 'BULK_LOGGED'] as const;

export interface DatabaseInit extends ContainerInit {
  owner: string;
  recoveryModel?: string;
  /** Directory of the data file; requires `dataSize` */
  dataFileDir?: string;
  /** Directory of the log file; defaults to `dataFileDir` */
  logFileDir?: string;
  dataSize?: number;
  logSize?: number;
  dataFileName?: string;
  logFileName?: string;
  schemas?: readonly DeclaredNode<'schema'>[];
  /** Shorthand for tables in the `dbo` schema */
  tables?: readonly DeclaredNode<'table'>[];
  users?: readonly DeclaredNode<'user'>[];
}

export function database(init: DatabaseInit): DeclaredNode<'database'> {
  const recoveryModel = (init.recoveryModel ?? 'FULL').toUpperCase();
  if (!RECOVERY_MODELS.some((model) => model === recoveryModel)) {
    throw new DeclarationError(`Invalid database recovery model: ${init.recoveryModel}`, {
      suggestion: `Use one of ${RECOVERY_MODELS.join(', ')}.`,
    });
  }

  let dataFilePath: string | null = null;
  let logFilePath: string | null = null;
  let dataSize: number | null = init.dataSize ?? null;
  let logSize: number | null = init.logSize ?? null;
  if (init.dataFileDir !== undefined) {
    if (!init.dataSize) {
      throw new DeclarationError(`Database "${init.name}": a data size is required with a data file directory`);
    }
    dataSize = init.dataSize;
    logSize = init.logSize ?? Math.max(1, Math.floor(init.dataSize / 10));
    dataFilePath = win32.join(init.dataFileDir, init.dataFileName ?? `${init.name}.mdf`);
    logFilePath = win32.join(init.logFileDir ?? init.dataFileDir, init.logFileName ?? `${init.name}_log.ldf`);
  }

  let schemas = init.schemas ?? [];
  if (init.tables && init.tables.length > 0) {
    if (init.schemas) {
      throw new DeclarationError(`Database "${init.name}": declare either tables or schemas, not both`);
    }
    schemas = [schema({ name: 'dbo', tables: init.tables })];
  }

  return new DeclaredNode('database', {
    name: init.name,
    oldName: init.oldName,
    ignoreExtraChildren: init.ignoreExtraChildren,
    attributes: {
      recovery_model_desc: recoveryModel,
      data_size: dataSize,
      log_size: logSize,
      owner: init.owner,
      data_file_path: dataFilePath,
      log_file_path: logFilePath,
    },
    children: [...schemas, ...(init.users ?? [])],
  });
}

export interface ServerInit {
  logins?: readonly DeclaredNode<'login'>[];
  databases?: readonly DeclaredNode<'database'>[];
  ignoreExtraChildren?: IgnoreExtraChildrenInput;
}

export function server(init: ServerInit = {}): DeclaredNode<'server'> {
  return new DeclaredNode('server', {
    name: '',
    ignoreExtraChildren: init.ignoreExtraChildren,
    attributes: {},
    children: [...(init.logins ?? []), ...(init.databases ?? [])],
  });
}

// =============================================================================
// Helpers
// =============================================================================

export function getTable(db: DeclaredNode<'database'>, tableName: string, schemaName = 'dbo'): DeclaredNode<'table'> {
  return db.getChild('schema', schemaName).getChild('table', tableName);
}

/**
 * Add a table, creating its schema when the database does not declare it yet
 */
export function addTable(db: DeclaredNode<'database'>, tableNode: DeclaredNode<'table'>, schemaName = 'dbo'): void {
  const wanted = schemaName.toLowerCase();
  let target = db.getChildren('schema').find((candidate) => candidate.name.toLowerCase() === wanted);
  if (!target) {
    target = schema({ name: schemaName });
    db.addChild(target);
  }
  target.addChild(tableNode);
}

/**
 * Key columns of the table's clustered index, if it declares one
 */
export function clusteredIndexColumns(tableNode: DeclaredNode<'table'>): string[] | null {
  const clustered = tableNode.getChildren('index').find((ix) => ix.attribute('clustered') === true);
  return clustered ? asNames(clustered.attribute('columns')) : null;
}
