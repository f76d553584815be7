import { armor as armorData, createMessage, encrypt, enums, readKey, type Key, type PublicKey } from "openpgp";
import type { EncryptionContext, EncryptionProvider } from "@pgp-mfa/core";

export interface KeySummary {
  fingerprint: string;
  keyId: string;
  userIds: string[];
  createdAt: string;
  /** null when the key never expires. */
  expiresAt: string | null;
}

const ARMOR_HEADER = "-----BEGIN PGP";
const textDecoder = new TextDecoder();

/** Parse ASCII-armored or binary OpenPGP key material. */
export async function parseKey(data: Uint8Array): Promise<Key> {
  const text = textDecoder.decode(data.subarray(0, 1024)).trimStart();
  if (text.startsWith(ARMOR_HEADER)) {
    return readKey({ armoredKey: textDecoder.decode(data) });
  }
  return readKey({ binaryKey: data });
}

/** Parse stored key material and keep only its public part. */
export async function parsePublicKey(data: Uint8Array): Promise<PublicKey> {
  const key = await parseKey(data);
  return key.toPublic();
}

export async function expirationOf(key: Key): Promise<Date | null> {
  const expiration = await key.getExpirationTime();
  return expiration instanceof Date ? expiration : null;
}

export async function summarizeKey(key: Key): Promise<KeySummary> {
  const expiresAt = await expirationOf(key);
  return {
    fingerprint: key.getFingerprint(),
    keyId: key.getKeyID().toHex(),
    userIds: key.getUserIDs(),
    createdAt: key.getCreationTime().toISOString(),
    expiresAt: expiresAt ? expiresAt.toISOString() : null,
  };
}

/** Encrypts challenges to a single OpenPGP recipient as binary messages. */
export class OpenPgpProvider implements EncryptionProvider<PublicKey> {
  async createContext(recipient: PublicKey): Promise<EncryptionContext> {
    // Throws when no subkey can encrypt (expired, revoked, sign-only).
    await recipient.getEncryptionKey();

    return {
      async encrypt(plaintext: Uint8Array): Promise<Uint8Array> {
        const message = await createMessage({ binary: plaintext });
        return encrypt({ message, encryptionKeys: recipient, format: "binary" });
      },
      async armor(ciphertext: Uint8Array): Promise<string> {
        return armorData(enums.armor.message, ciphertext);
      },
    };
  }
}
