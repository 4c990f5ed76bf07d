import { invariant } from '../jsutils/invariant';

import type {
  InputObjectTypeDef,
  LeafTypeDef,
  TypeModel,
} from '../typeModel/typeModel';

export function getNamedInputType(
  typeModel: TypeModel,
  name: string,
): LeafTypeDef | InputObjectTypeDef {
  const type = typeModel.getType(name);
  invariant(
    type !== undefined &&
      (type.kind === 'SCALAR' ||
        type.kind === 'ENUM' ||
        type.kind === 'INPUT_OBJECT'),
    `Expected "${name}" to be an input type.`,
  );
  return type;
}

export function isInputTypeName(typeModel: TypeModel, name: string): boolean {
  const type = typeModel.getType(name);
  return (
    type !== undefined &&
    (type.kind === 'SCALAR' ||
      type.kind === 'ENUM' ||
      type.kind === 'INPUT_OBJECT')
  );
}
