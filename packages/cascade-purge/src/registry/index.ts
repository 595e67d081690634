export { FrozenMap } from "./frozen-map";
export {
  buildRelationRegistry,
  defaultRelationHandlers,
  type RelationDefinition,
  type RelationEntry,
  type RelationHandlerFactory,
  type RelationHandlers,
  type RelationRegistry,
} from "./relation-registry";
