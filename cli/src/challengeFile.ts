import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface ChallengeFile {
  path: string;
  remove(): Promise<void>;
}

/** Write the armored challenge to a private temp directory for `gpg -d`. */
export async function writeChallengeFile(tempDir: string, armored: string): Promise<ChallengeFile> {
  const dir = await mkdtemp(join(tempDir, "pgp-mfa-challenge-"));
  const path = join(dir, "challenge.asc");
  try {
    await writeFile(path, `${armored}\n`, { mode: 0o600 });
  } catch (err) {
    await rm(dir, { recursive: true, force: true });
    throw err;
  }

  return {
    path,
    async remove() {
      await rm(dir, { recursive: true, force: true });
    },
  };
}

export function solveCommand(file: ChallengeFile): string {
  return `gpg -dq --batch < ${file.path}`;
}
