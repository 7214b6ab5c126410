import { Logger } from "@nestjs/common";
import { CoreDatabase } from "../core-database";
import { MigrationRunner } from "./runner";

const logger = new Logger("db-migrate");

async function run(command: string, runner: MigrationRunner): Promise<void> {
  switch (command) {
    case "up": {
      const applied = await runner.up();
      logger.log(applied.length > 0 ? `Applied ${applied.join(", ")}` : "Nothing to apply");
      return;
    }
    case "down": {
      const reverted = await runner.down();
      logger.log(reverted ? `Reverted ${reverted}` : "Nothing to revert");
      return;
    }
    case "status":
      for (const { id, applied } of await runner.status()) logger.log(`${applied ? "applied" : "pending"}  ${id}`);
      return;
    default:
      throw new Error(`Unknown command "${command}"; use up, down or status`);
  }
}

async function main(): Promise<void> {
  const db = new CoreDatabase({
    connectionString: process.env.ORDER_DATABASE_URL || process.env.DATABASE_URL,
    autoMigrate: false,
    log: (message) => logger.log(message),
  });
  await db.init();
  if (!db.isReady()) throw new Error("Database unavailable; set ORDER_DATABASE_URL or DATABASE_URL");

  try {
    await run(process.argv[2] || "status", new MigrationRunner(db));
  } finally {
    await db.close();
  }
}

main().catch((error: unknown) => {
  logger.error(String(error));
  process.exit(1);
});
