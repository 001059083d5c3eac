/**
 * Row Classifier
 *
 * Maps a NovaDAX transaction onto the Koinly ledger columns.
 *
 * Rules are evaluated in order against the normalized type label and the first
 * match wins. "saque de criptomoedas" must come after "taxa de saque de
 * criptomoedas", otherwise withdrawal fees would be booked as withdrawals.
 */

import type { ClassificationKind, SourceRecord } from "../presets/types";
import type { TargetRecord } from "../types";
import { DEFAULT_FIAT_CODE, REWARD_LABEL } from "./constants";
import { convertDate } from "./date-converter";
import { extractNumericValue } from "./numeric-extractor";
import { normalizeLabel } from "./text-normalizer";

/**
 * Sent/received/fee columns filled in by a rule
 */
export interface LedgerMovement {
  sentAmount?: string;
  sentCurrency?: string;
  receivedAmount?: string;
  receivedCurrency?: string;
  feeAmount?: string;
  feeCurrency?: string;
  label?: string;
}

/**
 * Inputs a rule sees for one record
 */
export interface RuleContext {
  /** Amount extracted from the amount column */
  amount: string;
  /** Currency column as exported */
  currency: string;
  /** True when the currency is the local fiat (case-insensitive) */
  isFiat: boolean;
  /** Fiat code the caller configured, upper-cased, e.g. "BRL" */
  fiatCode: string;
}

export interface ClassificationRule {
  kind: Exclude<ClassificationKind, "UNMATCHED">;
  /** Phrase searched for in the normalized type label */
  keyword: string;
  apply: (context: RuleContext) => LedgerMovement;
}

/**
 * Ordered rule set; first match wins
 */
export const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    kind: "TRANSACTION_FEE",
    keyword: "taxa de transacao",
    apply: ({ amount, currency }) => ({ feeAmount: amount, feeCurrency: currency }),
  },
  {
    kind: "WITHDRAWAL_FEE",
    keyword: "taxa de saque de criptomoedas",
    apply: ({ amount, currency }) => ({ feeAmount: amount, feeCurrency: currency }),
  },
  {
    kind: "FIAT_DEPOSIT",
    keyword: "deposito em reais",
    apply: ({ amount, currency }) => ({ receivedAmount: amount, receivedCurrency: currency }),
  },
  {
    kind: "REWARD",
    keyword: "redeemed bonus",
    apply: ({ amount, currency }) => ({
      receivedAmount: amount,
      receivedCurrency: currency,
      label: REWARD_LABEL,
    }),
  },
  {
    // Buying crypto: the fiat leg leaves the account, the crypto leg arrives
    kind: "PURCHASE",
    keyword: "compra",
    apply: ({ amount, currency, isFiat, fiatCode }) =>
      isFiat
        ? { sentAmount: amount, sentCurrency: fiatCode }
        : { receivedAmount: amount, receivedCurrency: currency },
  },
  {
    kind: "SALE",
    keyword: "venda",
    apply: ({ amount, currency, isFiat, fiatCode }) =>
      isFiat
        ? { receivedAmount: amount, receivedCurrency: fiatCode }
        : { sentAmount: amount, sentCurrency: currency },
  },
  {
    kind: "CRYPTO_WITHDRAWAL",
    keyword: "saque de criptomoedas",
    apply: ({ amount, currency }) => ({ sentAmount: amount, sentCurrency: currency }),
  },
];

/**
 * Find the first rule whose keyword occurs in the label
 *
 * @param normalizedLabel - Label already passed through normalizeLabel
 */
export function findMatchingRule(normalizedLabel: string): ClassificationRule | undefined {
  return CLASSIFICATION_RULES.find((rule) => normalizedLabel.includes(rule.keyword));
}

/**
 * Classification of one record
 */
export interface RecordClassification {
  kind: ClassificationKind;
  record: TargetRecord;
}

/**
 * Classify a NovaDAX record and build its Koinly ledger entry
 *
 * Unmatched transaction types still produce an entry, with every amount column empty.
 *
 * @param fiatCode - Local fiat currency code; written upper-cased
 */
export function classifyRecord(
  source: SourceRecord,
  fiatCode: string = DEFAULT_FIAT_CODE
): RecordClassification {
  const rule = findMatchingRule(normalizeLabel(source.typeLabel));
  const fiat = fiatCode.toUpperCase();

  const movement: LedgerMovement = rule
    ? rule.apply({
        amount: extractNumericValue(source.amountText),
        currency: source.currencyCode,
        isFiat: source.currencyCode.toUpperCase() === fiat,
        fiatCode: fiat,
      })
    : {};

  const record: TargetRecord = {
    date: convertDate(source.timestamp),
    sentAmount: movement.sentAmount ?? "",
    sentCurrency: movement.sentCurrency ?? "",
    receivedAmount: movement.receivedAmount ?? "",
    receivedCurrency: movement.receivedCurrency ?? "",
    feeAmount: movement.feeAmount ?? "",
    feeCurrency: movement.feeCurrency ?? "",
    netWorthAmount: "",
    netWorthCurrency: "",
    label: movement.label ?? "",
    description: source.typeLabel,
    txHash: "",
  };

  return { kind: rule ? rule.kind : "UNMATCHED", record };
}
