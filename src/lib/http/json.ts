/**
 * Lossless JSON decoding for exchange payloads.
 *
 * `JSON.parse` turns every number into a double, which silently corrupts
 * prices such as `0.1` once they are multiplied or compared and truncates
 * ids beyond 2^53. Numbers with a fraction or exponent, and integers outside
 * the safe range, are rewritten as strings before parsing so the schema layer
 * can decode them into Decimal values.
 */

const NUMBER_TOKEN = /-?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const needsQuoting = (token: string): boolean =>
  /[.eE]/.test(token) || !Number.isSafeInteger(Number(token));

const isNumberStart = (char: string): boolean => char === "-" || (char >= "0" && char <= "9");

/**
 * Rewrites lossy numeric literals of a JSON document as string literals.
 * String contents (including escaped quotes) are left untouched.
 */
export const quoteLossyNumbers = (text: string): string => {
  let output = "";
  let copiedUpTo = 0;
  let index = 0;

  while (index < text.length) {
    const char = text.charAt(index);

    if (char === '"') {
      index++;
      while (index < text.length) {
        const inner = text.charAt(index);
        if (inner === "\\") {
          index += 2;
        } else if (inner === '"') {
          index++;
          break;
        } else {
          index++;
        }
      }
      continue;
    }

    if (isNumberStart(char)) {
      NUMBER_TOKEN.lastIndex = index;
      const match = NUMBER_TOKEN.exec(text);
      if (match) {
        const token = match[0];
        if (needsQuoting(token)) {
          output += `${text.slice(copiedUpTo, index)}"${token}"`;
          copiedUpTo = index + token.length;
        }
        index += token.length;
        continue;
      }
    }

    index++;
  }

  return output + text.slice(copiedUpTo);
};

/**
 * Parses a JSON document keeping decimal and oversized numbers as strings.
 *
 * @throws SyntaxError when the text is not JSON
 */
export const parseJsonLossless = (text: string): unknown => {
  const parsed: unknown = JSON.parse(quoteLossyNumbers(text));
  return parsed;
};
