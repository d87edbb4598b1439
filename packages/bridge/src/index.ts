export { type ActionNames, actionNamesFor, toSnakeCase } from "./action-names.js";
export { type CallFunctionOptions, callFunction } from "./call-function.js";
export { type CallStreamOptions, callStream } from "./call-stream.js";
export {
  type BridgeClient,
  BridgeClientSchema,
  ClientRegistry,
  exposesFunction,
  functionNotFound,
} from "./client-registry.js";
export { dispatchVariant, type VariantHandlers } from "./dispatch-variant.js";
