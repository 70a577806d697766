import { appConfig } from "../config.js";
import type { ChatStoreLike } from "../services/ChatStore.js";
import { ChatStore } from "../services/ChatStore.js";
import { InMemoryChatStore } from "../services/InMemoryChatStore.js";
import { logger } from "../utils/logger.js";

let chatStoreSingleton: ChatStoreLike | null = null;

export function getChatStoreSingleton(): ChatStoreLike {
  if (chatStoreSingleton) {
    return chatStoreSingleton;
  }

  try {
    chatStoreSingleton = new ChatStore({ dbPath: appConfig.CHAT_DB_PATH });
  } catch (error) {
    logger.warn(
      { err: error, dbPath: appConfig.CHAT_DB_PATH },
      "SQLite chat store unavailable, falling back to in-memory store"
    );
    chatStoreSingleton = new InMemoryChatStore();
  }

  return chatStoreSingleton;
}

export function closeChatStore(): void {
  chatStoreSingleton?.close();
  chatStoreSingleton = null;
}
