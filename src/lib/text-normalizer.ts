/**
 * Fold a label to lowercase ASCII-equivalent text for keyword matching.
 *
 * Uses NFKD decomposition and drops the combining marks, so "Depósito em Reais"
 * becomes "deposito em reais" and compatibility forms ("ﬁ") fold to their base letters.
 *
 * @example
 * normalizeLabel("Taxa de Transação") // returns "taxa de transacao"
 * normalizeLabel("") // returns ""
 */
export function normalizeLabel(text: string): string {
  return text.normalize("NFKD").replace(/\p{M}/gu, "").toLowerCase();
}
