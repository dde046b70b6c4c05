// RFC 2822 message construction for the Gmail send endpoint

const PRINTABLE_ASCII = /^[\x20-\x7e]*$/;
const ASCII_TEXT = /^[\x00-\x7f]*$/;

export interface OutgoingEmail {
  to: string;
  subject: string;
  body: string;
}

// An encoded-word is at most 75 characters: 12 of framing, 60 of base64 (45 bytes)
const ENCODED_WORD_MAX_BYTES = 45;
const MAX_LINE_OCTETS = 998;

function encodedWord(text: string): string {
  return `=?UTF-8?B?${Buffer.from(text, 'utf8').toString('base64')}?=`;
}

/**
 * RFC 2047 encoded-words for header values outside printable ASCII, split on
 * character boundaries and folded onto continuation lines.
 */
export function encodeHeaderValue(value: string): string {
  if (PRINTABLE_ASCII.test(value)) return value;

  const words: string[] = [];
  let chunk = '';
  let chunkBytes = 0;
  for (const char of value) {
    const bytes = Buffer.byteLength(char, 'utf8');
    if (chunkBytes + bytes > ENCODED_WORD_MAX_BYTES) {
      words.push(encodedWord(chunk));
      chunk = '';
      chunkBytes = 0;
    }
    chunk += char;
    chunkBytes += bytes;
  }
  words.push(encodedWord(chunk));

  return words.join('\r\n ');
}

function fitsSevenBit(body: string): boolean {
  return ASCII_TEXT.test(body) && body.split('\r\n').every(line => line.length <= MAX_LINE_OCTETS);
}

function wrapBase64(encoded: string): string {
  return encoded.match(/.{1,76}/g)?.join('\r\n') ?? '';
}

export function buildMimeMessage(email: OutgoingEmail): string {
  const normalizedBody = email.body.replace(/\r?\n/g, '\r\n');
  const sevenBit = fitsSevenBit(normalizedBody);

  const headers = [
    `To: ${email.to}`,
    `Subject: ${encodeHeaderValue(email.subject)}`,
    'MIME-Version: 1.0',
    'Content-Type: text/plain; charset="UTF-8"',
    `Content-Transfer-Encoding: ${sevenBit ? '7bit' : 'base64'}`,
  ];

  const body = sevenBit
    ? normalizedBody
    : wrapBase64(Buffer.from(normalizedBody, 'utf8').toString('base64'));

  return `${headers.join('\r\n')}\r\n\r\n${body}`;
}

/** The `raw` field Gmail expects: the whole message, base64url encoded. */
export function encodeRawMessage(email: OutgoingEmail): string {
  return Buffer.from(buildMimeMessage(email), 'utf8').toString('base64url');
}
