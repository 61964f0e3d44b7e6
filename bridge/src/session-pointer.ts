import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { z } from "zod";

const pointerSchema = z.object({
  sessionId: z.string().min(1),
  botId: z.string().min(1),
});

export type SessionPointer = z.infer<typeof pointerSchema>;

/**
 * Remembers which session was displayed so the next start can restore it.
 * A missing or unreadable pointer just means "start fresh".
 */
export class SessionPointerFile {
  constructor(readonly path: string) {}

  read(): SessionPointer | null {
    if (!existsSync(this.path)) {
      return null;
    }
    try {
      const parsed = pointerSchema.safeParse(JSON.parse(readFileSync(this.path, "utf8")));
      if (parsed.success) {
        return parsed.data;
      }
      console.warn(`[sessions] ignoring malformed session pointer ${this.path}`);
    } catch (error) {
      console.warn(`[sessions] failed to read session pointer ${this.path}`, error);
    }
    return null;
  }

  write(pointer: SessionPointer): void {
    mkdirSync(dirname(this.path), { recursive: true });
    writeFileSync(this.path, `${JSON.stringify(pointer)}\n`, "utf8");
  }

  clear(): void {
    rmSync(this.path, { force: true });
  }
}
