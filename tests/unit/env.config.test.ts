import { loadEnv } from "../../src/shared/config/env";

describe("loadEnv", () => {
  it("uses defaults", () => {
    expect(loadEnv({})).toEqual({
      MONGO_URI: "mongodb://localhost:27017/jobqueue",
      JOBQUEUE_DB_NAME: "jobqueue"
    });
  });

  it.each([
    "mongodb://db.internal:27017/queue",
    "mongodb+srv://cluster0.example.net/queue"
  ])("accepts MONGO_URI with a mongodb scheme: %s", (uri) => {
    expect(loadEnv({ MONGO_URI: uri }).MONGO_URI).toBe(uri);
  });

  it("trims the database name and falls back on blank values", () => {
    expect(loadEnv({ JOBQUEUE_DB_NAME: "  queue_test " }).JOBQUEUE_DB_NAME).toBe("queue_test");
    expect(loadEnv({ JOBQUEUE_DB_NAME: "   " }).JOBQUEUE_DB_NAME).toBe("jobqueue");
  });

  it("accepts replica set seed lists", () => {
    const uri = "mongodb://db-a:27017,db-b:27017/queue?replicaSet=rs0";
    expect(loadEnv({ MONGO_URI: uri }).MONGO_URI).toBe(uri);
  });

  it.each(["localhost:27017", "postgres://localhost/queue", "mongodb://"])("rejects %s", (uri) => {
    expect(() => loadEnv({ MONGO_URI: uri })).toThrow(
      `MONGO_URI must be a mongodb:// or mongodb+srv:// URI. Received: ${uri}`
    );
  });
});
