import { Hono } from "hono";
import type { Context, Next } from "hono";

import {
  AdjustTokens,
  CommandInputError,
  EndRound,
  InvalidWordListError,
  ProcessMessage,
  ReplaceWordList,
  RoundAlreadyRunningError,
  RoundNotRunningError,
  UserNotFoundError,
  WordExistsError,
  parseWordList,
} from "./core.js";
import type { CommandContext, Logger, StoreGateway } from "./core.js";
import type { DispatchCommand } from "./dispatchCommand.js";

type ErrorStatus = 400 | 404 | 409 | 500;

type JsonBody = Record<string, unknown>;

export interface CreateBackendAppOptions {
  readonly port: number;
  readonly store: StoreGateway;
  readonly logger: Logger;
  readonly createContext: () => CommandContext;
  readonly dispatch: DispatchCommand;
}

export function createBackendApp({
  port,
  store,
  logger,
  createContext,
  dispatch,
}: CreateBackendAppOptions): Hono {
  const app = new Hono();

  app.use("/api/*", async (c: Context, next: Next): Promise<Response> => {
    c.header("Access-Control-Allow-Origin", "*");
    c.header("Access-Control-Allow-Headers", "Content-Type");
    c.header("Access-Control-Allow-Methods", "GET,POST,PUT,OPTIONS");
    if (c.req.method === "OPTIONS") {
      return c.json({ ok: true });
    }
    await next();
    return c.res;
  });

  app.get("/api/health", (c: Context) =>
    c.json({ ok: true, timestamp: Date.now(), config: { port } }),
  );

  app.post("/api/messages", async (c: Context) => {
    const body = await c.req.json<JsonBody>().catch(() => null);
    const username = body?.["username"];
    const message = body?.["message"];

    if (typeof username !== "string" || typeof message !== "string") {
      return c.json({ error: "username and message are required" }, 400);
    }

    try {
      const command = new ProcessMessage(username, message, Date.now());
      const result = await dispatch(command, createContext());
      if (!result) {
        return c.json({ success: false, running: false });
      }
      return c.json({ ...result, running: true });
    } catch (error) {
      return respondWithError(c, logger, "Message processing failed", error);
    }
  });

  app.get("/api/round", async (c: Context) => {
    const { engine } = createContext();
    const count = await store.remainingWordCount();

    if (!engine.running) {
      return c.json({
        running: false,
        category: null,
        pointValue: null,
        wordsRemaining: count,
      });
    }

    return c.json({
      running: true,
      category: engine.category,
      pointValue: engine.pointValue,
      wordsRemaining: count + 1,
    });
  });

  app.post("/api/round/end", async (c: Context) => {
    try {
      const ranking = await dispatch(new EndRound(Date.now()), createContext());
      return c.json({ ranking });
    } catch (error) {
      return respondWithError(c, logger, "Failed to end round", error);
    }
  });

  app.get("/api/highscores", async (c: Context) => {
    const highscores = await store.getHighscores();
    return c.json({ highscores });
  });

  app.get("/api/users/:username", async (c) => {
    const username = c.req.param("username");
    const account = await store.getUser(username);
    if (!account) {
      return c.json({ error: `User not found: ${username}` }, 404);
    }
    return c.json(account);
  });

  app.post("/api/users/:username/tokens", async (c) => {
    const username = c.req.param("username");
    const body = await c.req.json<JsonBody>().catch(() => null);
    const delta = body?.["delta"];

    if (typeof delta !== "number") {
      return c.json({ error: "delta is required" }, 400);
    }

    try {
      const command = new AdjustTokens(username, delta, Date.now());
      const tokens = await dispatch(command, createContext());
      return c.json({ username, tokens });
    } catch (error) {
      return respondWithError(c, logger, "Token adjustment failed", error);
    }
  });

  app.put("/api/wordlist", async (c: Context) => {
    const body = await c.req.json<unknown>().catch(() => null);
    const parsed = parseWordList(body);
    if (!parsed.ok) {
      return c.json({ error: parsed.error.message, issues: parsed.error.issues }, 400);
    }

    try {
      const command = new ReplaceWordList(parsed.value, Date.now());
      const outcome = await dispatch(command, createContext());
      return c.json(outcome);
    } catch (error) {
      return respondWithError(c, logger, "Word list replacement failed", error);
    }
  });

  return app;
}

function respondWithError(
  c: Context,
  logger: Logger,
  message: string,
  error: unknown,
): Response {
  const status = statusFor(error);
  if (status === 500) {
    logger.error(message, { error });
  } else {
    logger.warn(message, { error });
  }

  if (error instanceof CommandInputError || error instanceof InvalidWordListError) {
    return c.json({ error: error.message, issues: error.issues }, status);
  }
  return c.json({ error: getErrorMessage(error) }, status);
}

function statusFor(error: unknown): ErrorStatus {
  if (error instanceof CommandInputError || error instanceof InvalidWordListError) {
    return 400;
  }
  if (error instanceof WordExistsError) {
    return 400;
  }
  if (error instanceof UserNotFoundError) {
    return 404;
  }
  if (error instanceof RoundNotRunningError || error instanceof RoundAlreadyRunningError) {
    return 409;
  }
  return 500;
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return "Unknown error";
}
