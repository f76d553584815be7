import type { MfaContext } from "../context.js";
import { parsePublicKey, summarizeKey } from "../openpgp.js";
import { outputSuccess } from "../output.js";

export async function handleList(ctx: MfaContext): Promise<never> {
  const stored = await ctx.repository.list();

  const keys = await Promise.all(
    stored.map(async (entry, index) => {
      const summary = await summarizeKey(await parsePublicKey(entry.publicKey));
      return {
        index,
        fingerprint: entry.fingerprint,
        keyId: summary.keyId,
        userIds: summary.userIds,
        expiresAt: summary.expiresAt,
        importedAt: entry.createdAt.toISOString(),
      };
    })
  );

  return outputSuccess({ count: keys.length, keys });
}
