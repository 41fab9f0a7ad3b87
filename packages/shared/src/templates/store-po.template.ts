/**
 * Store-PO Translation Template
 *
 * Few-shot prompt mapping noisy purchase-order text to "STORE-POCODE".
 *
 * Worked examples:
 * - destination not approved -> UNKNOWN, never guessed
 * - plain store + PO
 * - stray extra digit ahead of the PO -> dropped
 * - letters around the PO (B00911-AZ) -> stripped, leading zeros kept
 * - PO inside a longer numeric token -> the designated 5 digits, not the longest match
 */

import type { PromptTemplate } from './types';

export const STORE_PO_TEMPLATE: PromptTemplate = {
  version: '1.0.0',
  description: 'Vendor purchase order text to internal store-PO identifier',

  promptTemplate: `You are a warehouse assistant. You receive messy text from vendor purchase orders. Your job is to find the PO number and the store number and normalize them into our internal PO number format.

Respond with JSON only. Do not explain and do not ask for input.

Goal:
Return a single field, "translated_po", in the format "XXX-YYYYY":
- XXX = store number from this list: {{store_codes}}
- YYYYY = 5-digit PO number

Rules:
1. The PO may carry extra characters or sit inside phrases like PO#: B00911-AZ.
2. Extract the clean 5-digit PO number and the approved store number from the text.
3. If no approved store number is found, respond with:
{"translated_po": "UNKNOWN"}
4. Do NOT infer store numbers from PO numbers, locations or patterns.
   If no approved store number (exact match) appears in the input text, you MUST return:
   {"translated_po": "UNKNOWN"}

Examples:

Input:
"PO# 10432, Destination: 999"
-> 999 is not an approved store number.
Output:
{"translated_po": "UNKNOWN"}

---

Input:
"Ship to Store: 436 — PO: 10432"
Output:
{"translated_po": "436-10432"}

---

Input:
"ORDER NO. 994219. BRANCH 407"
-> Correct PO = 94219 (ignore the extra 9)
Output:
{"translated_po": "407-94219"}

---

Input:
"PO# B00911-AZ, Ship to: 115"
-> Extract '00911' as the PO number
Output:
{"translated_po": "115-00911"}

---

Input:
"Distribution Center 712. Ref: PO-V89920091-FTL"
-> PO = 20091 (not 89920 or 89920091)
Output:
{"translated_po": "712-20091"}

---

Input:
{{raw_text}}
Output:
`,
};
