import {
  ComputeBudgetProgram,
  TransactionInstruction,
} from "@solana/web3.js";

export const DEFAULT_COMPUTE_UNIT_LIMIT = 85_000;

/** Compute budget program discriminator for SetLoadedAccountsDataSizeLimit. */
const SET_LOADED_ACCOUNTS_DATA_SIZE_LIMIT = 4;

export interface ComputeBudgetOptions {
  /** Micro-lamports per compute unit */
  priorityFeeMicroLamports?: number;
  computeUnitLimit?: number;
  /** Bytes of account data the transaction may load */
  accountDataSizeLimit?: number;
}

/**
 * web3.js has no builder for this instruction: one discriminator byte
 * followed by the limit as u32 little-endian.
 */
export function setLoadedAccountsDataSizeLimit(bytes: number): TransactionInstruction {
  if (!Number.isInteger(bytes) || bytes < 0 || bytes > 0xffffffff) {
    throw new RangeError(`Invalid loaded accounts data size limit: ${bytes}`);
  }

  const data = Buffer.alloc(5);
  data.writeUInt8(SET_LOADED_ACCOUNTS_DATA_SIZE_LIMIT, 0);
  data.writeUInt32LE(bytes, 1);

  return new TransactionInstruction({
    programId: ComputeBudgetProgram.programId,
    keys: [],
    data,
  });
}

export function hasBudgetOptions(options: ComputeBudgetOptions): boolean {
  return (
    options.priorityFeeMicroLamports !== undefined ||
    options.computeUnitLimit !== undefined ||
    options.accountDataSizeLimit !== undefined
  );
}

/**
 * Budget instructions in the order the runtime expects them: data size limit
 * (if given), unit limit (defaulted), unit price (if given). Empty when no
 * option is set.
 */
export function buildComputeBudgetInstructions(
  options: ComputeBudgetOptions
): TransactionInstruction[] {
  if (!hasBudgetOptions(options)) return [];

  const instructions: TransactionInstruction[] = [];

  if (options.accountDataSizeLimit !== undefined) {
    instructions.push(setLoadedAccountsDataSizeLimit(options.accountDataSizeLimit));
  }

  instructions.push(
    ComputeBudgetProgram.setComputeUnitLimit({
      units: options.computeUnitLimit ?? DEFAULT_COMPUTE_UNIT_LIMIT,
    })
  );

  if (options.priorityFeeMicroLamports !== undefined) {
    instructions.push(
      ComputeBudgetProgram.setComputeUnitPrice({
        microLamports: options.priorityFeeMicroLamports,
      })
    );
  }

  return instructions;
}
