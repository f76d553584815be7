import type { MfaContext } from "../context.js";
import { importKey } from "../keyImport.js";
import { outputSuccess } from "../output.js";

export async function handleImport(ctx: MfaContext, source: string): Promise<never> {
  const summary = await importKey({ source, repository: ctx.repository });
  return outputSuccess({ message: "key imported", key: summary });
}
