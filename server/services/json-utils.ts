/**
 * JSON helpers for model output
 *
 * Oracle responses arrive as free text: JSON wrapped in markdown fences or prose,
 * and sometimes cut off at the output token limit.
 */

/**
 * Extracts the outermost {...} (or [...]) from text and parses it.
 * Truncated output is repaired down to the last complete element of `arrayKey`.
 * Returns null when nothing usable is found.
 */
export function safeParseJSON(text: string, source = "unknown", arrayKey = "attractions"): unknown {
  const jsonMatch = text.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
  if (!jsonMatch) {
    console.warn(`[${source}] No JSON found in response (length ${text.length})`);
    return null;
  }

  try {
    return JSON.parse(jsonMatch[0]);
  } catch (error) {
    const repaired = repairTruncatedJSON(jsonMatch[0], arrayKey);
    if (repaired !== null) {
      console.warn(`[${source}] ⚠️ Truncated JSON repaired`);
      return repaired;
    }
    console.error(`[${source}] JSON parse failed:`, error instanceof Error ? error.message : error);
    console.error(`[${source}] Raw text (first 200 chars): ${text.substring(0, 200)}`);
    return null;
  }
}

/**
 * Keeps the complete objects of a cut-off array and closes the document.
 *
 * {"name":"A","attractions":[{"name":"B"},{"name":"C","lat
 * → {"name":"A","attractions":[{"name":"B"}]}
 */
export function repairTruncatedJSON(broken: string, arrayKey = "attractions"): unknown {
  const keyIndex = broken.indexOf(`"${arrayKey}"`);
  const arrStart = broken.indexOf("[", keyIndex === -1 ? 0 : keyIndex);
  if (arrStart === -1) return null;

  let lastCompleteIdx = -1;
  let braceDepth = 0;
  let inString = false;
  let escapeNext = false;

  for (let i = arrStart + 1; i < broken.length; i++) {
    const ch = broken[i];

    if (escapeNext) { escapeNext = false; continue; }
    if (ch === "\\") { escapeNext = true; continue; }
    if (ch === "\"") { inString = !inString; continue; }
    if (inString) continue;

    if (ch === "{") braceDepth++;
    if (ch === "}") {
      braceDepth--;
      if (braceDepth === 0) lastCompleteIdx = i;
    }
    // Array closed: nothing was truncated inside it
    if (ch === "]" && braceDepth === 0) break;
  }

  if (lastCompleteIdx === -1) return null;

  const closing = broken.trimStart().startsWith("[") ? "]" : "]}";
  const repaired = broken.substring(0, lastCompleteIdx + 1) + closing;
  try {
    return JSON.parse(repaired);
  } catch (error) {
    console.warn(`[json] repair failed: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }
}

/** "12.5" → 12.5, clamped to [min, max]; anything unparseable → undefined */
export function safeNumber(value: unknown, min?: number, max?: number): number | undefined {
  if (value === undefined || value === null || value === "") return undefined;
  if (typeof value !== "number" && typeof value !== "string") return undefined;
  const num = typeof value === "number" ? value : Number(value.trim().replace(",", "."));
  if (!Number.isFinite(num)) return undefined;
  if (min !== undefined && num < min) return min;
  if (max !== undefined && num > max) return max;
  return num;
}

export function safeString(value: unknown, maxLength?: number): string | undefined {
  if (typeof value !== "string" && typeof value !== "number") return undefined;
  const str = String(value).trim();
  if (str === "") return undefined;
  if (maxLength && str.length > maxLength) return str.substring(0, maxLength);
  return str;
}
