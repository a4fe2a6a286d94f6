export type { HitlRequest, HitlResolver } from './types.js';
export {
  createConstantResolver,
  createInteractiveResolver,
  createScriptedResolver,
  createSeededResolver,
  parseHitlAnswer,
  resolverForMode,
  type InteractiveResolverOptions,
  type ResolverSettings,
  type SeededResolverOptions,
} from './resolvers.js';
export { HitlQueue, QUEUE_CSV_HEADER, type HitlIncident } from './queue.js';
