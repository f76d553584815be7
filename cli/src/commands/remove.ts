import { matchFingerprint } from "@pgp-mfa/core";
import type { MfaContext } from "../context.js";
import { logStatus, outputSuccess } from "../output.js";

export async function handleRemove(ctx: MfaContext, fingerprint: string): Promise<never> {
  const key = matchFingerprint(await ctx.repository.list(), fingerprint);
  await ctx.repository.remove(key.fingerprint);
  logStatus(`removed key: ${key.fingerprint}`);
  return outputSuccess({ message: "key removed", fingerprint: key.fingerprint });
}
