// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@attestor/agent-worker/adapters/ledger/viem-ledger-counter-client`
 * Purpose: LedgerCounterClient over JSON-RPC using viem.
 * Scope: Sends forwardAttestation from the agent account, waits for the receipt, looks up earlier forwards, reads getInfo. No signing of attestations.
 * Invariants:
 * - Contract reverts surface as ContractRevertError carrying the custom error name
 * - Once a transaction hash exists, any failure to confirm it is a ForwardUnconfirmedError naming that hash
 * - The record id is the uid from the AttestationForwarded event of the mined receipt
 * Side-effects: IO (RPC calls, transactions)
 * Links: packages/ledger-counter/src/abi.ts
 * @public
 */

import type { DelegatedAttestationRequest } from "@attestor/attestation-core";
import {
  ContractRevertError,
  type CounterInfo,
  type ForwardReceipt,
  type ForwardStatus,
  ForwardUnconfirmedError,
  LEDGER_COUNTER_ABI,
  type LedgerCounterClient,
} from "@attestor/ledger-counter";
import {
  type Address,
  BaseError,
  type Chain,
  ContractFunctionRevertedError,
  createPublicClient,
  createWalletClient,
  defineChain,
  type Hex,
  isHex,
  type LocalAccount,
  parseEventLogs,
  type PublicClient,
  type TransactionReceipt,
  TransactionNotFoundError,
  TransactionReceiptNotFoundError,
  type Transport,
  type WalletClient,
} from "viem";

export interface ViemLedgerCounterClientConfig {
  readonly address: Address;
  readonly account: LocalAccount;
  readonly chain: Chain;
  readonly transport: Transport;
}

/** Minimal chain definition for a configured id and RPC URL. */
export function chainFor(chainId: number, rpcUrl: string): Chain {
  return defineChain({
    id: chainId,
    name: `chain-${chainId}`,
    nativeCurrency: { name: "Ether", symbol: "ETH", decimals: 18 },
    rpcUrls: { default: { http: [rpcUrl] } },
  });
}

/**
 * Finds a contract revert anywhere in a viem error chain.
 */
export function toContractRevertError(
  error: unknown
): ContractRevertError | null {
  if (!(error instanceof BaseError)) return null;
  const reverted = error.walk((e) => e instanceof ContractFunctionRevertedError);
  if (!(reverted instanceof ContractFunctionRevertedError)) return null;
  return new ContractRevertError(
    reverted.data?.errorName ?? reverted.reason ?? "UnknownRevert"
  );
}

export class ViemLedgerCounterClient implements LedgerCounterClient {
  private readonly publicClient: PublicClient<Transport, Chain>;
  private readonly walletClient: WalletClient<Transport, Chain, LocalAccount>;

  constructor(private readonly config: ViemLedgerCounterClientConfig) {
    this.publicClient = createPublicClient({
      chain: config.chain,
      transport: config.transport,
    });
    this.walletClient = createWalletClient({
      account: config.account,
      chain: config.chain,
      transport: config.transport,
    });
  }

  async forwardAttestation(
    request: DelegatedAttestationRequest
  ): Promise<ForwardReceipt> {
    let hash: Hex;
    try {
      hash = await this.walletClient.writeContract({
        address: this.config.address,
        abi: LEDGER_COUNTER_ABI,
        functionName: "forwardAttestation",
        args: [request],
      });
    } catch (error) {
      throw toContractRevertError(error) ?? error;
    }

    let receipt: TransactionReceipt;
    try {
      receipt = await this.publicClient.waitForTransactionReceipt({ hash });
    } catch (error) {
      throw new ForwardUnconfirmedError(hash, { cause: error });
    }
    if (receipt.status !== "success") {
      throw new ContractRevertError("TransactionReverted", hash);
    }
    return this.toForwardReceipt(hash, receipt);
  }

  async getForwardStatus(transactionReference: string): Promise<ForwardStatus> {
    if (!isHex(transactionReference)) {
      throw new Error(`Not a transaction hash: ${transactionReference}`);
    }
    const hash = transactionReference;

    try {
      const receipt = await this.publicClient.getTransactionReceipt({ hash });
      if (receipt.status !== "success") {
        return { state: "reverted", reason: "TransactionReverted" };
      }
      return { state: "confirmed", receipt: this.toForwardReceipt(hash, receipt) };
    } catch (error) {
      if (!(error instanceof TransactionReceiptNotFoundError)) throw error;
    }

    try {
      await this.publicClient.getTransaction({ hash });
      return { state: "pending" };
    } catch (error) {
      if (error instanceof TransactionNotFoundError) return { state: "unknown" };
      throw error;
    }
  }

  async getInfo(signer: Address): Promise<CounterInfo> {
    const [active, count] = await this.publicClient.readContract({
      address: this.config.address,
      abi: LEDGER_COUNTER_ABI,
      functionName: "getInfo",
      args: [signer],
    });
    return { active, count };
  }

  private toForwardReceipt(hash: Hex, receipt: TransactionReceipt): ForwardReceipt {
    const [forwarded] = parseEventLogs({
      abi: LEDGER_COUNTER_ABI,
      eventName: "AttestationForwarded",
      logs: receipt.logs,
    });
    if (!forwarded) {
      throw new ForwardUnconfirmedError(hash, {
        cause: new Error("no AttestationForwarded event in receipt"),
      });
    }
    return { recordId: forwarded.args.uid, transactionReference: hash };
  }
}
