export { isoAfter, msUntil, nowIso } from "./date";
export { generateId, type IdGenerator, purgeTaskId } from "./id";
export {
  err,
  isErr,
  isOk,
  ok,
  type Result,
  unwrap,
} from "./result";
