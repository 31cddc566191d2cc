export { type ControlApiDeps, type ControlHandler, createControlHandler } from "./control-api.js";
export {
  type AdjustParams,
  AdjustParamsSchema,
  parseQuery,
  type SetParams,
  SetParamsSchema,
} from "./params.js";
