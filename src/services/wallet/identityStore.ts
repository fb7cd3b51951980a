/**
 * JSON file persistence for pool identities.
 *
 * The file holds secret keys in the clear (base58); it is written with
 * owner-only permissions.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { Keypair } from "@solana/web3.js";
import bs58 from "bs58";
import { ZodError } from "zod";
import {
  persistedIdentityPoolSchema,
  type Identity,
  type PersistedIdentityPool,
} from "../../types/identityPool.js";
import { IdentityPoolError, toError } from "../../utils/errors.js";
import { createChildLogger } from "../../utils/logger.js";

const logger = createChildLogger({ component: "identity-store" });

export interface IdentityStore {
  /** Null when nothing has been saved yet */
  load(): Promise<Omit<Identity, "index">[] | null>;
  save(identities: readonly Identity[]): Promise<void>;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export class FileIdentityStore implements IdentityStore {
  constructor(private readonly path: string) {}

  async load(): Promise<Omit<Identity, "index">[] | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw new IdentityPoolError("Failed to read identity storage", toError(error));
    }

    let state: PersistedIdentityPool;
    try {
      state = persistedIdentityPoolSchema.parse(JSON.parse(raw));
    } catch (error) {
      const detail =
        error instanceof ZodError
          ? error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
          : toError(error).message;
      throw new IdentityPoolError(`Identity storage is malformed: ${detail}`, toError(error));
    }

    const identities = state.identities.map((entry, position) => {
      let keypair: Keypair;
      try {
        keypair = Keypair.fromSecretKey(bs58.decode(entry.secretKey));
      } catch (error) {
        throw new IdentityPoolError(
          `Identity ${position} has an invalid secret key`,
          toError(error)
        );
      }

      return {
        keypair,
        publicKey: keypair.publicKey,
        balanceLamports: BigInt(entry.balanceLamports),
        tokenBalance: BigInt(entry.tokenBalance),
        totalTrades: entry.totalTrades,
        lastUsedAt: entry.lastUsed,
      };
    });

    logger.info("Loaded identities from storage", { count: identities.length });
    return identities;
  }

  async save(identities: readonly Identity[]): Promise<void> {
    const state: PersistedIdentityPool = {
      identities: identities.map((identity) => ({
        secretKey: bs58.encode(identity.keypair.secretKey),
        balanceLamports: identity.balanceLamports.toString(),
        tokenBalance: identity.tokenBalance.toString(),
        totalTrades: identity.totalTrades,
        lastUsed: identity.lastUsedAt,
      })),
    };

    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, JSON.stringify(state, null, 2), { encoding: "utf8", mode: 0o600 });

    logger.info("Saved identities to storage", { count: identities.length });
  }
}
