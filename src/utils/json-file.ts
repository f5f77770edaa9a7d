/**
 * JSON file backed by a zod schema.
 *
 * A missing file yields the fallback value. A file that fails to parse or
 * validate is logged and also replaced by the fallback.
 */

import fs from "fs";
import type { z } from "zod";
import { log } from "./logger.js";
import { errorMessage } from "../errors.js";
import { writeFileSecure } from "./file-permissions.js";

export class JsonFile<S extends z.ZodTypeAny> {
  constructor(
    readonly filePath: string,
    private readonly schema: S,
    private readonly fallback: () => z.output<S>
  ) {}

  load(): z.output<S> {
    if (!fs.existsSync(this.filePath)) {
      return this.fallback();
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
      const parsed = this.schema.safeParse(raw);
      if (parsed.success) {
        return parsed.data;
      }
      log.warning(`⚠️ Ignoring invalid data in ${this.filePath}: ${parsed.error.issues[0]?.message ?? "schema mismatch"}`);
    } catch (error) {
      log.warning(`⚠️ Could not read ${this.filePath}: ${errorMessage(error)}`);
    }
    return this.fallback();
  }

  save(data: z.output<S>): void {
    writeFileSecure(this.filePath, JSON.stringify(data, null, 2));
  }
}
