export interface ServerConfig {
  readonly port: number;
  /** SQLite database file, or ":memory:" */
  readonly databasePath: string;
  /** JSON word list that seeds an empty pool at startup */
  readonly wordListPath: string | undefined;
}

const DEFAULT_PORT = 8787;
const DEFAULT_DATABASE_PATH = "data/word-hunt.db";

export function readServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env["PORT"] ?? DEFAULT_PORT);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new Error(`PORT must be an integer between 0 and 65535, got "${env["PORT"]}"`);
  }

  const wordListPath = env["WORDLIST_PATH"]?.trim();

  return {
    port,
    databasePath: env["DATABASE_PATH"]?.trim() || DEFAULT_DATABASE_PATH,
    wordListPath: wordListPath ? wordListPath : undefined,
  };
}
