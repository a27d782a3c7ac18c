import { createClient } from "redis";
import { createLogger, describeError } from "../utils/logger";

const logger = createLogger("redis");

type RedisClientInstance = ReturnType<typeof createClient>;

export type RedisStatus = "disabled" | "connecting" | "ready" | "error";

export interface RedisManager {
  client: RedisClientInstance | null;
  status: RedisStatus;
  error: Error | undefined;
  connect: () => Promise<void>;
  disconnect: () => Promise<void>;
  getJson: (key: string) => Promise<unknown>;
  setJson: (key: string, value: unknown) => Promise<void>;
}

const toError = (error: unknown) => (error instanceof Error ? error : new Error(String(error)));

const NOOP_MANAGER: RedisManager = {
  client: null,
  status: "disabled",
  error: undefined,
  connect: async () => {
    logger.info("Redis disabled; skipping connect");
  },
  disconnect: async () => {
    logger.info("Redis disabled; skipping disconnect");
  },
  getJson: async () => null,
  setJson: async () => undefined,
};

export const createRedisManager = (redisUrl: string | undefined): RedisManager => {
  if (!redisUrl) {
    logger.info("Redis URL not configured; crowd validations persist to disk");
    return NOOP_MANAGER;
  }

  const client = createClient({ url: redisUrl });
  let status: RedisStatus = "connecting";
  let connectionError: Error | undefined;

  client.on("error", (error: unknown) => {
    status = "error";
    connectionError = toError(error);
    logger.error("Redis connection error", { message: connectionError.message });
  });

  client.on("end", () => {
    status = "disabled";
    logger.info("Redis connection closed");
  });

  const connect = async () => {
    if (status === "ready") return;
    try {
      status = "connecting";
      await client.connect();
      status = "ready";
      connectionError = undefined;
      logger.info("Redis connection established");
    } catch (error) {
      status = "error";
      connectionError = toError(error);
      logger.error("Failed to connect to Redis", { message: connectionError.message });
    }
  };

  const disconnect = async () => {
    if (status === "disabled" || status === "error") return;
    try {
      await client.disconnect();
      status = "disabled";
    } catch (error) {
      logger.warn("Failed to close Redis connection", { message: describeError(error) });
    }
  };

  const getJson = async (key: string): Promise<unknown> => {
    if (status !== "ready") return null;
    const payload = await client.get(key);
    if (!payload) return null;
    return JSON.parse(payload);
  };

  const setJson = async (key: string, value: unknown) => {
    if (status !== "ready") {
      throw new Error(`Redis is not ready (status: ${status})`);
    }
    await client.set(key, JSON.stringify(value));
  };

  return {
    client,
    get status() {
      return status;
    },
    get error() {
      return connectionError;
    },
    connect,
    disconnect,
    getJson,
    setJson,
  };
};
