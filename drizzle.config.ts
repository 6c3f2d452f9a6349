import { config } from "dotenv";
import { defineConfig } from "drizzle-kit";

// Local development reads .env.local; deployed environments set POSTGRES_URL directly.
config({ path: ".env.local" });

const url = process.env.POSTGRES_URL;
if (!url) {
  throw new Error("POSTGRES_URL environment variable is not set");
}

export default defineConfig({
  schema: "./lib/db/schema.ts",
  out: "./lib/db/migrations",
  dialect: "postgresql",
  dbCredentials: { url },
});
