import { existsSync, readFileSync } from "node:fs";
import { createKeyStore, type KeyStore } from "@polyvox/contracts";
import dotenv from "dotenv";

/** Reads provider keys from a dotenv-style file; a missing file yields an empty store. */
export function loadKeys(path: string): KeyStore {
  if (!existsSync(path)) {
    console.warn("[cli] keys file not found, no providers configured", { path });
    return createKeyStore({});
  }
  return createKeyStore(dotenv.parse(readFileSync(path)));
}
