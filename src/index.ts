export { link } from './linker.js';
export type { LinkOptions, LinkedFunction, LinkedFunctions, ResultOf } from './linker.js';

export {
  archiveOrigin,
  defineContracts,
  directoryOrigin,
  moduleOrigin,
} from './contract/contractTypes.js';
export type { ContractOrigin, ContractTable, FunctionContract } from './contract/contractTypes.js';
export type { BindingDescriptor } from './contract/descriptor.js';
export { resolveContracts, DEFAULT_SCRIPT_EXTENSION } from './contract/resolveDescriptor.js';
export type { ResolveOptions } from './contract/resolveDescriptor.js';
export { cleanupExtractedScripts, extractedDirectories } from './contract/extractScript.js';
export { parseManifest, parseTypeName, readManifest } from './contract/manifest.js';
export type { Manifest, ManifestOptions } from './contract/manifest.js';
export { checkManifest, checkResultsToJson, formatCheckResults, formatCheckResultsJson } from './check.js';
export type { CheckResult } from './check.js';

export { t } from './types/typeTags.js';
export type { TypeTag, ValueOf, PrimitiveName, TypedArrayName } from './types/typeTags.js';

export { BridgedValue, defineBridgedType } from './bridged/bridgedTypes.js';
export type { BridgedType, SerializedGetter, SerializedSetter } from './bridged/bridgedTypes.js';
export { RemoteVariable, RemoteVariableType } from './bridged/RemoteVariable.js';

export { EngineSession, SessionClosedError } from './engine/session.js';
export type { EngineCallable, RemoteEngine } from './engine/engineTypes.js';
export { ScriptedEngine } from './engine/scriptedEngine.js';
export type { EngineCall, EngineFunction } from './engine/scriptedEngine.js';

export { ReturnTuple } from './coerce/returnTuple.js';
export { DEFAULT_NAMING } from './invoke/invocationTypes.js';
export type { NamingOptions } from './invoke/invocationTypes.js';

export {
  ArgumentError,
  CleanupError,
  EngineInvocationError,
  IncompatibleReturnError,
  LinkingError,
  ScriptlinkError,
} from './errors.js';
export type { ErrorClass, ScriptlinkErrorCode } from './errors.js';

export { setDebugEnabled } from './dx/logger.js';
