import { isBridgedTag, type TypeTag } from '../types/typeTags.js';

/**
 * Resolved, validated description of one declared call.
 *
 * Created once by `link()` and read-only afterwards.
 */
export type BindingDescriptor = Readonly<{
  /** Key of the contract in its table */
  key: string;
  /** Function name as the engine knows it */
  name: string;
  /** null: resolved through the engine's search path */
  containingDirectory: string | null;
  nargout: number;
  /** One tag per returned value; the void tag alone when nargout is 0 */
  returnTypes: readonly TypeTag[];
  parameterTypes: readonly TypeTag[];
  usesBridgedTypes: boolean;
  resultShape: TypeTag;
}>;

export function createDescriptor(input: Omit<BindingDescriptor, 'usesBridgedTypes'>): BindingDescriptor {
  const usesBridgedTypes = [...input.returnTypes, ...input.parameterTypes].some(isBridgedTag);
  return Object.freeze({
    ...input,
    returnTypes: Object.freeze([...input.returnTypes]),
    parameterTypes: Object.freeze([...input.parameterTypes]),
    usesBridgedTypes,
  });
}
