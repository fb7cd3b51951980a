import type { Commitment, TransactionConfirmationStatus } from "@solana/web3.js";
import type { RpcConnection } from "../../types/rpc.js";
import { BlockchainError } from "../../utils/errors.js";
import { sleep } from "../../utils/helpers.js";

const COMMITMENT_RANK: Record<TransactionConfirmationStatus, number> = {
  processed: 0,
  confirmed: 1,
  finalized: 2,
};

function requiredRank(commitment: Commitment): number {
  switch (commitment) {
    case "processed":
    case "recent":
      return COMMITMENT_RANK.processed;
    case "finalized":
    case "max":
    case "root":
      return COMMITMENT_RANK.finalized;
    default:
      return COMMITMENT_RANK.confirmed;
  }
}

export interface ConfirmationOptions {
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

/**
 * Poll the signature status until it reaches `commitment`. No implicit
 * timeout; pass a signal to bound the wait. Throws when the transaction
 * landed with an error.
 */
export async function waitForConfirmation(
  connection: RpcConnection,
  signature: string,
  commitment: Commitment,
  options: ConfirmationOptions = {}
): Promise<void> {
  const pollIntervalMs = options.pollIntervalMs ?? 1000;
  const target = requiredRank(commitment);

  for (;;) {
    const { value } = await connection.getSignatureStatus(signature, {
      searchTransactionHistory: false,
    });

    if (value?.err) {
      throw new BlockchainError(
        `Transaction failed: ${JSON.stringify(value.err)}`,
        signature
      );
    }

    if (
      value?.confirmationStatus &&
      COMMITMENT_RANK[value.confirmationStatus] >= target
    ) {
      return;
    }

    await sleep(pollIntervalMs, options.signal);
  }
}
