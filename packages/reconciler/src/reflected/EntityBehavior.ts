/**
 * Entity Behavior
 *
 * Per-type table of live operations: listing, matching, creation, detail
 * retrieval, attribute readers and setters, rename and delete. The reflected
 * node dispatches through these tables; a missing entry is a gap the node
 * reports rather than an error.
 *
 * @module packages/reconciler/reflected/EntityBehavior
 */

import type { AttributeName, AttributeValue, DeclaredNode, EntityType } from '@dbconverge/core/domain';
import type { Row } from '@dbconverge/core/ports';
import type { MutationResult } from '../types.js';
import type { ReflectedNode } from './ReflectedNode.js';

/**
 * Derives one attribute from the node's detail row, usually with an extra query.
 */
export type AttributeReader<T extends EntityType> = (node: ReflectedNode<T>, detail: Row) => Promise<AttributeValue>;

/**
 * Changes one attribute on the live server to the declared value.
 */
export type AttributeSetter<T extends EntityType> = (
  node: ReflectedNode<T>,
  declared: DeclaredNode<T>
) => Promise<MutationResult>;

export interface EntityBehavior<T extends EntityType> {
  readonly type: T;

  /** Live names never listed as children, compared case-insensitively */
  readonly systemNames: readonly string[];

  /** Whether the engine may create missing objects of this type */
  readonly creatable: boolean;

  listNames(parent: ReflectedNode): Promise<string[]>;

  nameExists(parent: ReflectedNode, name: string): Promise<boolean>;

  /**
   * Live name of the counterpart of a declared node, or null.
   * Defaults to existence of the declared name.
   */
  fromDeclared?(parent: ReflectedNode, declared: DeclaredNode<T>): Promise<string | null>;

  /** Whether a live node is the counterpart of a declared one. Defaults to name or old name. */
  matches?(node: ReflectedNode<T>, declared: DeclaredNode<T>): Promise<boolean>;

  create?(parent: ReflectedNode, declared: DeclaredNode<T>): Promise<void>;

  /** Detail row the attributes derive from; undefined when the object is gone */
  fetchDetail(node: ReflectedNode<T>): Promise<Row | undefined>;

  readonly readers?: { readonly [K in AttributeName<T>]?: AttributeReader<T> };

  readonly setters?: { readonly [K in AttributeName<T>]?: AttributeSetter<T> };

  rename?(node: ReflectedNode<T>, newName: string): Promise<void>;

  remove?(node: ReflectedNode<T>): Promise<MutationResult>;

  /** Reason the node must not be deleted automatically, or null */
  deleteRefusal?(node: ReflectedNode<T>): string | null;
}
