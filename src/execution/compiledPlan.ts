import type {
  FieldNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  OperationTypeNode,
} from 'graphql';

import type { ReadOnlyObjMap } from '../jsutils/ObjMap';

import type {
  AbstractTypeDef,
  LeafTypeDef,
  ObjectTypeDef,
  ResolverHandle,
} from '../typeModel/typeModel';
import type { TypeRef } from '../typeModel/typeRefs';

import type { Guard } from './collectFields';
import type {
  ArgumentEvaluator,
  CompiledVariableDefinition,
} from './values';

/**
 * An operation compiled against a type model. Plans are immutable and hold
 * no request data, so one plan serves every execution of its signature.
 */
export interface CompiledPlan {
  readonly signature: string;
  readonly operation: OperationDefinitionNode;
  readonly operationType: OperationTypeNode;
  readonly operationName: string | undefined;
  readonly fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
  readonly variableDefinitions: ReadonlyArray<CompiledVariableDefinition>;
  readonly root: CompiledObjectPlan;
}

/**
 * The fields selected on one concrete object type, in response order.
 */
export interface CompiledObjectPlan {
  readonly type: ObjectTypeDef;
  readonly fields: ReadonlyArray<CompiledField>;
}

interface CompiledFieldBase {
  readonly responseKey: string;
  readonly fieldName: string;
  readonly parentTypeName: string;
  readonly fieldNodes: ReadonlyArray<FieldNode>;
  /**
   * Alternative guards, one of which must hold for the field to be
   * included. `undefined` when the field is always included.
   */
  readonly guards: ReadonlyArray<Guard> | undefined;
}

export interface CompiledResolverField extends CompiledFieldBase {
  readonly kind: 'resolver';
  readonly returnType: TypeRef;
  readonly argumentEvaluator: ArgumentEvaluator;
  readonly resolver: ResolverHandle;
  readonly completion: CompletionPlan;
}

export interface CompiledTypenameField extends CompiledFieldBase {
  readonly kind: 'typename';
}

export type CompiledField = CompiledResolverField | CompiledTypenameField;

export interface NonNullCompletion {
  readonly kind: 'NON_NULL';
  readonly ofType: NullableCompletion;
}

export interface ListCompletion {
  readonly kind: 'LIST';
  readonly ofType: CompletionPlan;
}

export interface LeafCompletion {
  readonly kind: 'LEAF';
  readonly type: LeafTypeDef;
}

export interface ObjectCompletion {
  readonly kind: 'OBJECT';
  readonly plan: CompiledObjectPlan;
}

export interface AbstractCompletion {
  readonly kind: 'ABSTRACT';
  readonly type: AbstractTypeDef;
  /** One plan per possible object type, keyed by type name. */
  readonly plans: ReadOnlyObjMap<CompiledObjectPlan>;
}

export type NullableCompletion =
  | ListCompletion
  | LeafCompletion
  | ObjectCompletion
  | AbstractCompletion;

/**
 * How a resolved value is turned into its response value, mirroring the
 * wrapping of the field's declared type.
 */
export type CompletionPlan = NonNullCompletion | NullableCompletion;
