/**
 * Declared Schema File Schemas
 *
 * Zod schemas for the YAML file that declares a server: logins, databases,
 * schemas, users and tables down to columns, keys, indexes and partitions.
 *
 * @module packages/cli/commands/schema/schemas
 */

import { z } from 'zod';
import {
  carriesCharLength,
  ENTITY_TYPES,
  isSupportedDataType,
  MAX_NAME_LENGTH,
  RECOVERY_MODELS,
} from '@dbconverge/core/domain';

// ============================================================================
// Shared
// ============================================================================

const NameSchema = z
  .string()
  .min(1, 'Name cannot be empty')
  .max(MAX_NAME_LENGTH, `Name must be ${MAX_NAME_LENGTH} characters or less`);

/**
 * Which undeclared live children to leave alone: `true` or `all` for every
 * type, a list for the named types.
 */
export const IgnoreExtraChildrenSchema = z.union([
  z.boolean(),
  z.enum(['all', 'none']),
  z.array(z.enum(ENTITY_TYPES)),
]);

export type IgnoreExtraChildrenConfig = z.infer<typeof IgnoreExtraChildrenSchema>;

const CompressionSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(['NONE', 'ROW', 'PAGE']));

const ContainerFields = {
  name: NameSchema,
  /** Previous name; the live object is renamed when found under it */
  oldName: NameSchema.optional(),
  ignoreExtraChildren: IgnoreExtraChildrenSchema.optional(),
};

// ============================================================================
// Table Members
// ============================================================================

export const ColumnSchema = z
  .object({
    name: NameSchema,
    oldName: NameSchema.optional(),
    type: z
      .string()
      .transform((value) => value.toLowerCase())
      .refine(isSupportedDataType, (value) => ({ message: `Unsupported column type: "${value}"` })),
    /** Character length; `max` (or -1) for the large types */
    length: z.union([z.number().int().positive(), z.literal(-1), z.literal('max')]).optional(),
    precision: z.number().int().positive().optional(),
    scale: z.number().int().nonnegative().optional(),
    datetimePrecision: z.number().int().min(0).max(7).optional(),
    nullable: z.boolean().optional().default(false),
    identity: z.boolean().optional().default(false),
    /** Declares a primary key on this column when the table declares none */
    primaryKey: z.boolean().optional().default(false),
  })
  .superRefine((column, ctx) => {
    if (carriesCharLength(column.type) && column.length === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Column "${column.name}" of type ${column.type} needs a length`,
        path: ['length'],
      });
    }
  });

export type ColumnConfig = z.infer<typeof ColumnSchema>;

const KeyColumnsSchema = z.union([NameSchema, z.array(NameSchema).min(1, 'At least one column is required')]);

export const PrimaryKeySchema = z.object({
  name: NameSchema.optional(),
  columns: KeyColumnsSchema,
  clustered: z.boolean().optional().default(true),
  compression: CompressionSchema.optional().default('NONE'),
});

export type PrimaryKeyConfig = z.infer<typeof PrimaryKeySchema>;

export const IndexSchema = z.object({
  name: NameSchema.optional(),
  oldName: NameSchema.optional(),
  columns: KeyColumnsSchema,
  includedColumns: z.array(NameSchema).optional().default([]),
  clustered: z.boolean().optional().default(false),
  unique: z.boolean().optional().default(false),
  compression: CompressionSchema.optional().default('NONE'),
});

export type IndexConfig = z.infer<typeof IndexSchema>;

export const ForeignKeySchema = z.object({
  column: NameSchema,
  references: z.object({
    schema: NameSchema.optional().default('dbo'),
    table: NameSchema,
    column: NameSchema,
  }),
});

export type ForeignKeyConfig = z.infer<typeof ForeignKeySchema>;

// ============================================================================
// Containers
// ============================================================================

export const TableSchema = z
  .object({
    ...ContainerFields,
    columns: z.array(ColumnSchema).min(1, 'A table needs at least one column'),
    primaryKey: PrimaryKeySchema.optional(),
    indexes: z.array(IndexSchema).optional().default([]),
    /** Column the table is partitioned on, by day */
    partition: NameSchema.optional(),
    foreignKeys: z.array(ForeignKeySchema).optional().default([]),
  })
  .superRefine((table, ctx) => {
    const columnNames = new Set(table.columns.map((c) => c.name.toLowerCase()));
    const checkColumn = (name: string, path: (string | number)[]) => {
      if (!columnNames.has(name.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Table "${table.name}" has no column "${name}"`,
          path,
        });
      }
    };

    const seen = new Set<string>();
    table.columns.forEach((column, i) => {
      if (seen.has(column.name.toLowerCase())) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate column name: "${column.name}"`,
          path: ['columns', i, 'name'],
        });
      }
      seen.add(column.name.toLowerCase());
    });

    if (table.primaryKey) {
      const keyColumns = typeof table.primaryKey.columns === 'string' ? [table.primaryKey.columns] : table.primaryKey.columns;
      keyColumns.forEach((name) => checkColumn(name, ['primaryKey', 'columns']));
    }
    table.indexes.forEach((idx, i) => {
      const keyColumns = typeof idx.columns === 'string' ? [idx.columns] : idx.columns;
      [...keyColumns, ...idx.includedColumns].forEach((name) => checkColumn(name, ['indexes', i, 'columns']));
    });
    if (table.partition !== undefined) {
      checkColumn(table.partition, ['partition']);
    }
    table.foreignKeys.forEach((fk, i) => checkColumn(fk.column, ['foreignKeys', i, 'column']));
  });

export type TableConfig = z.infer<typeof TableSchema>;

export const SchemaSchema = z.object({
  ...ContainerFields,
  tables: z.array(TableSchema).optional().default([]),
});

export type SchemaConfig = z.infer<typeof SchemaSchema>;

export const UserSchema = z.object({
  name: NameSchema,
  oldName: NameSchema.optional(),
  /** Login the user maps to; defaults to the user's name */
  login: NameSchema.optional(),
  dbRoles: z.array(NameSchema).optional().default([]),
});

export type UserConfig = z.infer<typeof UserSchema>;

export const DatabaseSchema = z
  .object({
    ...ContainerFields,
    owner: NameSchema,
    recoveryModel: z
      .string()
      .transform((value) => value.toUpperCase())
      .pipe(z.enum(RECOVERY_MODELS))
      .optional(),
    dataFileDir: z.string().min(1).optional(),
    logFileDir: z.string().min(1).optional(),
    dataFileName: z.string().min(1).optional(),
    logFileName: z.string().min(1).optional(),
    /** Sizes in MB */
    dataSize: z.number().int().positive().optional(),
    logSize: z.number().int().positive().optional(),
    schemas: z.array(SchemaSchema).optional(),
    /** Tables of the `dbo` schema */
    tables: z.array(TableSchema).optional(),
    users: z.array(UserSchema).optional().default([]),
  })
  .superRefine((db, ctx) => {
    if (db.schemas !== undefined && db.tables !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Database "${db.name}" declares both tables and schemas`,
        path: ['tables'],
      });
    }
    if (db.dataFileDir !== undefined && db.dataSize === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Database "${db.name}" needs a dataSize with its dataFileDir`,
        path: ['dataSize'],
      });
    }
  });

export type DatabaseConfig = z.infer<typeof DatabaseSchema>;

export const LoginSchema = z.object({
  name: NameSchema,
  oldName: NameSchema.optional(),
  type: z.string().optional().default('SQL_LOGIN'),
  serverRoles: z.array(NameSchema).optional().default([]),
});

export type LoginConfig = z.infer<typeof LoginSchema>;

// ============================================================================
// Schema File
// ============================================================================

/**
 * Top-level declared schema file
 */
export const SchemaFileSchema = z
  .object({
    /** File format version */
    version: z.literal('1'),

    server: z
      .object({
        ignoreExtraChildren: IgnoreExtraChildrenSchema.optional(),
        logins: z.array(LoginSchema).optional().default([]),
        databases: z.array(DatabaseSchema).optional().default([]),
      })
      .optional()
      .default({}),
  })
  .superRefine((file, ctx) => {
    const unique = (names: string[], what: string, path: string[]) => {
      const seen = new Set<string>();
      for (const name of names) {
        if (seen.has(name.toLowerCase())) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Duplicate ${what} name: "${name}"`, path });
        }
        seen.add(name.toLowerCase());
      }
    };

    unique(
      file.server.logins.map((l) => l.name),
      'login',
      ['server', 'logins']
    );
    unique(
      file.server.databases.map((d) => d.name),
      'database',
      ['server', 'databases']
    );
  });

export type SchemaFile = z.infer<typeof SchemaFileSchema>;
