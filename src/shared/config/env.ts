export type Env = {
  MONGO_URI: string;
  JOBQUEUE_DB_NAME: string;
};

// new URL() rejects multi-host seed lists, so only the scheme is checked here.
const validateMongoUri = (name: string, value: string): string => {
  if (!/^mongodb(\+srv)?:\/\/\S+$/.test(value.trim())) {
    throw new Error(`${name} must be a mongodb:// or mongodb+srv:// URI. Received: ${value}`);
  }

  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const MONGO_URI = validateMongoUri("MONGO_URI", env.MONGO_URI ?? "mongodb://localhost:27017/jobqueue");
  const dbName = env.JOBQUEUE_DB_NAME?.trim();
  const JOBQUEUE_DB_NAME = dbName ? dbName : "jobqueue";

  return { MONGO_URI, JOBQUEUE_DB_NAME };
};
