/**
 * Tests for the core Ledger class.
 *
 * Covers:
 * - Deposits and withdrawals (locked accounts, duplicates, insufficient funds)
 * - Dispute lifecycle (dispute, resolve, chargeback)
 * - Cross-client and unknown references
 * - Locked-account semantics for dispute kinds
 * - Lazy account creation and snapshot ordering
 * - Stats and invariant checks
 * - The five reference scenarios
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AccountView, Amount, ClientId, TransactionRecord } from "@payledger/types";
import { Ledger } from "../src/ledger.js";
import { MAX_AMOUNT, parseAmount } from "../src/amount.js";
import { LedgerError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

function deposit(client: number, tx: number, amount: string): TransactionRecord {
  return { type: "deposit", client, tx, amount: parseAmount(amount) };
}

function withdrawal(client: number, tx: number, amount: string): TransactionRecord {
  return { type: "withdrawal", client, tx, amount: parseAmount(amount) };
}

function dispute(client: number, tx: number): TransactionRecord {
  return { type: "dispute", client, tx };
}

function resolve(client: number, tx: number): TransactionRecord {
  return { type: "resolve", client, tx };
}

function chargeback(client: number, tx: number): TransactionRecord {
  return { type: "chargeback", client, tx };
}

function view(
  client: number,
  available: string,
  held: string,
  total: string,
  locked = false,
): AccountView {
  return { client, available, held, total, locked };
}

/** Reaches past apply() to break balances the way a defect would. */
class TamperedLedger extends Ledger {
  drainHeld(client: ClientId, amount: Amount): void {
    this._accounts.get(client)?.release(amount);
  }
}

function applyAll(ledger: Ledger, records: readonly TransactionRecord[]): void {
  for (const record of records) {
    ledger.apply(record);
  }
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger();
  });

  // ─── Deposits ────────────────────────────────────────────────────────

  describe("deposit", () => {
    it("credits available funds and records history", () => {
      const outcome = ledger.apply(deposit(1, 1, "10.0"));
      expect(outcome.status).toBe("applied");
      expect(ledger.snapshot()).toEqual([view(1, "10.0000", "0.0000", "10.0000")]);
      expect(ledger.getHistoryEntry(1)).toEqual({
        tx: 1,
        client: 1,
        kind: "deposit",
        amount: 100_000n,
        status: "none",
      });
    });

    it("accepts a zero deposit", () => {
      expect(ledger.apply(deposit(1, 1, "0")).status).toBe("applied");
      expect(ledger.historyCount).toBe(1);
    });

    it("rejects a duplicate transaction ID", () => {
      ledger.apply(deposit(1, 1, "10.0"));
      const outcome = ledger.apply(deposit(1, 1, "5.0"));
      expect(outcome).toEqual({
        status: "rejected",
        record: deposit(1, 1, "5.0"),
        code: "DUPLICATE_TRANSACTION",
        message: "Transaction 1 already exists",
      });
      expect(ledger.snapshot()).toEqual([view(1, "10.0000", "0.0000", "10.0000")]);
    });

    it("rejects a deposit reusing a withdrawal's ID from another client", () => {
      ledger.apply(deposit(1, 1, "10.0"));
      ledger.apply(withdrawal(1, 2, "1.0"));
      const outcome = ledger.apply(deposit(2, 2, "3.0"));
      expect(outcome).toMatchObject({ status: "rejected", code: "DUPLICATE_TRANSACTION" });
      expect(ledger.getAccount(2)?.available).toBe(0n);
    });
  });

  // ─── Withdrawals ─────────────────────────────────────────────────────

  describe("withdrawal", () => {
    it("debits available funds", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), withdrawal(1, 2, "2.5")]);
      expect(ledger.snapshot()).toEqual([view(1, "7.5000", "0.0000", "7.5000")]);
    });

    it("allows withdrawing the full balance", () => {
      applyAll(ledger, [deposit(1, 1, "4.0"), withdrawal(1, 2, "4.0")]);
      expect(ledger.snapshot()).toEqual([view(1, "0.0000", "0.0000", "0.0000")]);
    });

    it("rejects insufficient funds and leaves the account unchanged", () => {
      ledger.apply(deposit(1, 1, "4.0"));
      const outcome = ledger.apply(withdrawal(1, 2, "4.0001"));
      expect(outcome).toMatchObject({
        status: "rejected",
        code: "INSUFFICIENT_FUNDS",
        message: "Insufficient available funds for withdrawal 2",
      });
      expect(ledger.snapshot()).toEqual([view(1, "4.0000", "0.0000", "4.0000")]);
      expect(ledger.getHistoryEntry(2)).toBeUndefined();
    });

    it("records the withdrawal in history", () => {
      applyAll(ledger, [deposit(1, 1, "4.0"), withdrawal(1, 2, "1.0")]);
      expect(ledger.getHistoryEntry(2)?.kind).toBe("withdrawal");
    });
  });

  // ─── Disputes ────────────────────────────────────────────────────────

  describe("dispute", () => {
    it("moves the deposited amount from available to held", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), deposit(1, 2, "3.0"), dispute(1, 1)]);
      expect(ledger.snapshot()).toEqual([view(1, "3.0000", "10.0000", "13.0000")]);
      expect(ledger.getHistoryEntry(1)?.status).toBe("disputed");
    });

    it("disputes a withdrawal with the same arithmetic", () => {
      applyAll(ledger, [deposit(1, 1, "1.0"), withdrawal(1, 2, "0.4"), dispute(1, 2)]);
      expect(ledger.snapshot()).toEqual([view(1, "0.2000", "0.4000", "0.6000")]);
    });

    it("rejects a second dispute of the same transaction", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), dispute(1, 1)]);
      const outcome = ledger.apply(dispute(1, 1));
      expect(outcome).toMatchObject({
        status: "rejected",
        code: "INVALID_TRANSITION",
        message: 'Cannot dispute transaction 1 in status "disputed"',
      });
      expect(ledger.snapshot()).toEqual([view(1, "0.0000", "10.0000", "10.0000")]);
    });

    it("rejects a dispute when the funds were already withdrawn", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), withdrawal(1, 2, "8.0")]);
      const outcome = ledger.apply(dispute(1, 1));
      expect(outcome).toMatchObject({ status: "rejected", code: "INSUFFICIENT_FUNDS" });
      expect(ledger.snapshot()).toEqual([view(1, "2.0000", "0.0000", "2.0000")]);
      expect(ledger.getHistoryEntry(1)?.status).toBe("none");
    });

    it("rejects an unknown transaction", () => {
      const outcome = ledger.apply(dispute(1, 42));
      expect(outcome).toMatchObject({
        status: "rejected",
        code: "UNKNOWN_TRANSACTION",
        message: "No deposit or withdrawal with ID 42",
      });
    });

    it("disputes the accepted amount, not a rejected duplicate's", () => {
      applyAll(ledger, [deposit(1, 1, "1.0"), deposit(1, 1, "9.0"), dispute(1, 1)]);
      expect(ledger.snapshot()).toEqual([view(1, "0.0000", "1.0000", "1.0000")]);
    });
  });

  // ─── Cross-client References ─────────────────────────────────────────

  describe("client ownership", () => {
    beforeEach(() => {
      applyAll(ledger, [deposit(1, 1, "10.0"), deposit(2, 2, "5.0")]);
    });

    it("rejects a dispute of another client's transaction", () => {
      const outcome = ledger.apply(dispute(2, 1));
      expect(outcome).toMatchObject({
        status: "rejected",
        code: "CLIENT_MISMATCH",
        message: "Transaction 1 belongs to client 1, not 2",
      });
      expect(ledger.snapshot()).toEqual([
        view(1, "10.0000", "0.0000", "10.0000"),
        view(2, "5.0000", "0.0000", "5.0000"),
      ]);
    });

    it("rejects resolve and chargeback from the wrong client", () => {
      ledger.apply(dispute(1, 1));
      expect(ledger.apply(resolve(2, 1))).toMatchObject({ code: "CLIENT_MISMATCH" });
      expect(ledger.apply(chargeback(2, 1))).toMatchObject({ code: "CLIENT_MISMATCH" });
      expect(ledger.getHistoryEntry(1)?.status).toBe("disputed");
      expect(ledger.getAccount(2)?.locked).toBe(false);
    });
  });

  // ─── Resolve ─────────────────────────────────────────────────────────

  describe("resolve", () => {
    it("returns balances to their pre-dispute values", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), deposit(1, 2, "2.5")]);
      const before = ledger.snapshot();
      applyAll(ledger, [dispute(1, 1), resolve(1, 1)]);
      expect(ledger.snapshot()).toEqual(before);
      expect(ledger.getHistoryEntry(1)?.status).toBe("resolved");
    });

    it("cannot re-dispute a resolved transaction", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), dispute(1, 1), resolve(1, 1)]);
      expect(ledger.apply(dispute(1, 1))).toMatchObject({
        code: "INVALID_TRANSITION",
        message: 'Cannot dispute transaction 1 in status "resolved"',
      });
      expect(ledger.snapshot()).toEqual([view(1, "10.0000", "0.0000", "10.0000")]);
    });

    it("rejects a resolve without a dispute", () => {
      ledger.apply(deposit(1, 1, "10.0"));
      expect(ledger.apply(resolve(1, 1))).toMatchObject({
        code: "INVALID_TRANSITION",
        message: 'Cannot resolve transaction 1 in status "none"',
      });
    });

    it("rejects a resolve of an unknown transaction", () => {
      expect(ledger.apply(resolve(1, 7))).toMatchObject({ code: "UNKNOWN_TRANSACTION" });
    });
  });

  // ─── Chargeback ──────────────────────────────────────────────────────

  describe("chargeback", () => {
    it("removes held funds and locks the account", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), deposit(1, 2, "1.0"), dispute(1, 1), chargeback(1, 1)]);
      expect(ledger.snapshot()).toEqual([view(1, "1.0000", "0.0000", "1.0000", true)]);
      expect(ledger.getHistoryEntry(1)?.status).toBe("charged_back");
    });

    it("rejects a chargeback without a dispute", () => {
      ledger.apply(deposit(1, 1, "10.0"));
      expect(ledger.apply(chargeback(1, 1))).toMatchObject({ code: "INVALID_TRANSITION" });
      expect(ledger.getAccount(1)?.locked).toBe(false);
    });

    it("cannot dispute a charged-back transaction again", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), dispute(1, 1), chargeback(1, 1)]);
      expect(ledger.apply(dispute(1, 1))).toMatchObject({ code: "INVALID_TRANSITION" });
    });

    it("rejects deposits and withdrawals afterwards", () => {
      applyAll(ledger, [deposit(1, 1, "10.0"), deposit(1, 2, "1.0"), dispute(1, 1), chargeback(1, 1)]);
      expect(ledger.apply(deposit(1, 3, "5.0"))).toMatchObject({
        code: "ACCOUNT_LOCKED",
        message: "Client 1 is locked; deposit 3 refused",
      });
      expect(ledger.apply(withdrawal(1, 4, "1.0"))).toMatchObject({ code: "ACCOUNT_LOCKED" });
      expect(ledger.snapshot()).toEqual([view(1, "1.0000", "0.0000", "1.0000", true)]);
      expect(ledger.getHistoryEntry(3)).toBeUndefined();
    });

    it("still processes dispute kinds on a locked account", () => {
      applyAll(ledger, [
        deposit(1, 1, "5.0"),
        deposit(1, 2, "3.0"),
        dispute(1, 1),
        dispute(1, 2),
        chargeback(1, 1),
      ]);
      expect(ledger.snapshot()).toEqual([view(1, "0.0000", "3.0000", "3.0000", true)]);

      expect(ledger.apply(resolve(1, 2)).status).toBe("applied");
      expect(ledger.snapshot()).toEqual([view(1, "3.0000", "0.0000", "3.0000", true)]);
    });
  });

  // ─── Accounts and Snapshot ───────────────────────────────────────────

  describe("snapshot", () => {
    it("hands out balances that cannot change the ledger", () => {
      ledger.apply(deposit(1, 1, "10.0"));
      const balances = ledger.getAccount(1);
      expect(balances).toEqual({
        client: 1,
        available: 100_000n,
        held: 0n,
        total: 100_000n,
        locked: false,
      });
      expect(balances).not.toHaveProperty("credit");
      ledger.apply(deposit(1, 2, "1.0"));
      expect(balances?.available).toBe(100_000n);
      expect(ledger.getAccount(1)?.available).toBe(110_000n);
    });

    it("orders accounts by ascending client ID", () => {
      applyAll(ledger, [deposit(9, 1, "1.0"), deposit(2, 2, "2.0"), deposit(300, 3, "3.0")]);
      expect(ledger.snapshot().map((a) => a.client)).toEqual([2, 9, 300]);
    });

    it("creates an account on first reference even when rejected", () => {
      ledger.apply(withdrawal(5, 1, "1.0"));
      expect(ledger.hasAccount(5)).toBe(true);
      expect(ledger.snapshot()).toEqual([view(5, "0.0000", "0.0000", "0.0000")]);
    });

    it("is empty for a fresh ledger", () => {
      expect(ledger.snapshot()).toEqual([]);
      expect(ledger.accountCount).toBe(0);
    });
  });

  // ─── Malformed Records ───────────────────────────────────────────────

  describe("malformed records", () => {
    it("rejects a record that fails structural validation without creating an account", () => {
      const bad: TransactionRecord = { type: "deposit", client: 1, tx: 1, amount: -5n };
      expect(ledger.apply(bad)).toMatchObject({ status: "rejected", code: "MALFORMED_RECORD" });
      expect(ledger.accountCount).toBe(0);
    });

    it("rejects an out-of-range client ID", () => {
      expect(ledger.apply(dispute(70_000, 1))).toMatchObject({ code: "MALFORMED_RECORD" });
    });
  });

  // ─── Stats ───────────────────────────────────────────────────────────

  describe("stats", () => {
    it("counts applied and rejected records by code", () => {
      applyAll(ledger, [
        deposit(1, 1, "1.0"),
        deposit(1, 1, "1.0"),
        withdrawal(1, 2, "5.0"),
        dispute(1, 9),
        dispute(1, 1),
      ]);
      expect(ledger.stats).toEqual({
        applied: 2,
        rejected: 3,
        rejectionsByCode: {
          DUPLICATE_TRANSACTION: 1,
          INSUFFICIENT_FUNDS: 1,
          UNKNOWN_TRANSACTION: 1,
        },
      });
    });

    it("returns a copy that later applies do not change", () => {
      const stats = ledger.stats;
      ledger.apply(dispute(1, 1));
      expect(stats.rejectionsByCode).toEqual({});
    });
  });

  // ─── Invariants ──────────────────────────────────────────────────────

  describe("invariants", () => {
    it("passes for any sequence the ledger accepted", () => {
      applyAll(ledger, [
        deposit(1, 1, "10.0"),
        deposit(2, 2, "4.0"),
        dispute(1, 1),
        dispute(2, 2),
        resolve(2, 2),
      ]);
      expect(() => ledger.assertInvariants()).not.toThrow();
    });

    it("detects held funds that no longer match open disputes", () => {
      const tampered = new TamperedLedger();
      applyAll(tampered, [deposit(1, 1, "10.0"), dispute(1, 1)]);
      tampered.drainHeld(1, 100_000n);
      expect(() => tampered.assertInvariants()).toThrow(
        "Invariant violated for client 1: held 0.0000 does not match open disputes 10.0000",
      );
    });

    it("throws INVARIANT_VIOLATION when a chargeback finds held short", () => {
      const tampered = new TamperedLedger();
      applyAll(tampered, [deposit(1, 1, "10.0"), dispute(1, 1)]);
      tampered.drainHeld(1, 100_000n);
      expect(() => tampered.apply(chargeback(1, 1))).toThrow(LedgerError);
      expect(() => tampered.apply(chargeback(1, 1))).toThrow(/held cannot cover charged-back tx 1/);
    });

    it("throws INVARIANT_VIOLATION when a resolve finds held short", () => {
      const tampered = new TamperedLedger();
      applyAll(tampered, [deposit(1, 1, "10.0"), dispute(1, 1)]);
      tampered.drainHeld(1, 40_000n);
      expect(() => tampered.apply(resolve(1, 1))).toThrow(
        "Invariant violated for client 1: held cannot cover resolved tx 1",
      );
      expect(tampered.getHistoryEntry(1)?.status).toBe("disputed");
    });

    it("throws INVARIANT_VIOLATION when a resolve overflows available", () => {
      applyAll(ledger, [
        { type: "deposit", client: 1, tx: 1, amount: MAX_AMOUNT },
        dispute(1, 1),
        { type: "deposit", client: 1, tx: 2, amount: MAX_AMOUNT },
      ]);
      expect(() => ledger.apply(resolve(1, 1))).toThrow(
        "Invariant violated for client 1: releasing tx 1 overflows available",
      );
    });
  });

  // ─── Reference Scenarios ─────────────────────────────────────────────

  describe("scenarios", () => {
    it("A: two deposits and a withdrawal", () => {
      applyAll(ledger, [deposit(1, 1, "10.0000"), deposit(1, 2, "5.0000"), withdrawal(1, 3, "3.0000")]);
      expect(ledger.snapshot()).toEqual([view(1, "12.0000", "0.0000", "12.0000")]);
    });

    it("B: a disputed deposit is held", () => {
      applyAll(ledger, [deposit(2, 10, "20.0000"), dispute(2, 10)]);
      expect(ledger.snapshot()).toEqual([view(2, "0.0000", "20.0000", "20.0000")]);
    });

    it("C: a chargeback locks the account and blocks later deposits", () => {
      applyAll(ledger, [deposit(2, 10, "20.0000"), dispute(2, 10), chargeback(2, 10)]);
      expect(ledger.snapshot()).toEqual([view(2, "0.0000", "0.0000", "0.0000", true)]);

      expect(ledger.apply(deposit(2, 11, "5.0000")).status).toBe("rejected");
      expect(ledger.snapshot()).toEqual([view(2, "0.0000", "0.0000", "0.0000", true)]);
    });

    it("D: a withdrawal from a fresh account is rejected", () => {
      expect(ledger.apply(withdrawal(3, 20, "50.0000")).status).toBe("rejected");
      expect(ledger.snapshot()).toEqual([view(3, "0.0000", "0.0000", "0.0000")]);
    });

    it("E: a dispute of an unknown transaction leaves an all-zero account", () => {
      expect(ledger.apply(dispute(4, 99)).status).toBe("rejected");
      expect(ledger.snapshot()).toEqual([view(4, "0.0000", "0.0000", "0.0000")]);
    });
  });
});
