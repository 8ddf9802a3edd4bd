import type { MetaGateway } from "./MetaGateway.js";
import type { UserGateway } from "./UserGateway.js";
import type { WordGateway } from "./WordGateway.js";

/**
 * The single embedded store behind a round engine. Each engine performs
 * read-modify-write sequences (fetch words, pick one, delete it), so one store
 * must not be shared by two engines unless the adapter makes selection atomic.
 */
export interface StoreGateway extends WordGateway, UserGateway, MetaGateway {}
