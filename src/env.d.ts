declare namespace NodeJS {
  interface ProcessEnv {
    MONGO_URI?: string;           // e.g. mongodb://localhost:27017
    MONGO_DB_NAME?: string;       // default demo_todo
    MONGO_COLLECTION?: string;    // default todo
    PORT?: string;
    HOST?: string;
    LOG_FORMAT?: string;          // morgan format (dev, combined, ...)
    STORE_TIMEOUT_MS?: string;
    SHUTDOWN_TIMEOUT_MS?: string;
    TODO_STORE?: string;          // mongo | memory
  }
}
