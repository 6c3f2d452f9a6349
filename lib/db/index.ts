/**
 * Drizzle ORM client.
 *
 * @vercel/postgres reads POSTGRES_URL and opens its pool on the first
 * query, so importing this module does not connect.
 */

import { sql } from "@vercel/postgres";
import { drizzle } from "drizzle-orm/vercel-postgres";
import * as schema from "./schema";

export const db = drizzle({ client: sql, schema });

export type Database = typeof db;
