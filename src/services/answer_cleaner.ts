/*-------------------------------------------------------------------
  Strips boilerplate the model tends to add around an answer:
  lead-ins, chunk/section references and list markers.
-------------------------------------------------------------------*/

const LEAD_INS: RegExp[] = [
  /^based on the provided document context,?\s*/i,
  /^according to the provided document context,?\s*/i,
  /^according to the document,?\s*/i,
  /^according to the policy,?\s*/i,
  /^the document states that\s*/i,
  /^from the provided context,?\s*/i,
  /^in the document,?\s*/i,
  /^as per the policy,?\s*/i,
  /^the policy states that\s*/i,
];

const CHUNK_REFERENCES: RegExp[] = [
  /\s*\(chunk \d+[^)]*\)/gi,
  /\s*this is stated in chunk \d+[^.]*\.?/gi,
  /\s*as mentioned in chunk \d+[^.]*\.?/gi,
  /\s*according to chunk \d+[^.]*\.?/gi,
  /\s*based on chunk \d+[^.]*\.?/gi,
  /\s*(?:in|from) chunk \d+[^.]*\.?/gi,
  /\s*chunk \d+[:\-\s]/gi,
];

const SECTION_REFERENCES = /\s*(?:as per|under) section [a-z0-9.]*[a-z0-9]\.?/gi;

/** Turns bullet and numbered list markers into running text. */
function flattenLists(text: string): string {
  return text
    .replace(/(?:^|\n)\s*[*\-•]\s+/g, " ")
    .replace(/(?:^|\n)\s*\d+\.\s+/g, " ");
}

export function cleanAnswer(raw: string): string {
  let cleaned = raw.trim();

  for (const pattern of LEAD_INS) cleaned = cleaned.replace(pattern, "");
  for (const pattern of CHUNK_REFERENCES) cleaned = cleaned.replace(pattern, "");

  cleaned = flattenLists(cleaned);
  cleaned = cleaned.replace(SECTION_REFERENCES, "");

  cleaned = cleaned.replace(/\s+/g, " ").trim();
  cleaned = cleaned.replace(/\.{2,}/g, ".");
  cleaned = cleaned.replace(/^[\s.,]+|[\s,]+$/g, "");

  if (!cleaned) return "";
  return cleaned[0].toUpperCase() + cleaned.slice(1);
}
