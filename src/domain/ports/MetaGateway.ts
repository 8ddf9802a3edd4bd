/** String key/value storage used to rebuild round state after a restart. */
export interface MetaGateway {
  getMeta(key: string): Promise<string | undefined>;
  setMeta(key: string, value: string): Promise<void>;
}
