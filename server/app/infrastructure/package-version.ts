import fs from "node:fs";
import { z } from "zod";

const packageSchema = z.object({ version: z.string().min(1) });

export function readPackageVersion(file: string): string {
  const raw: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
  return packageSchema.parse(raw).version;
}
