// Charsets servers send by default when they do not know better; a page
// labelled with one of these often carries UTF-8 or a legacy CJK encoding.
const WEAK_CHARSETS = new Set(['iso-8859-1', 'latin1', 'us-ascii', 'ascii', 'windows-1252']);

const SNIFF_BYTES = 4096;

const normalizeLabel = (label: string | null | undefined): string | null => {
  const cleaned = label?.trim().replace(/^["']|["']$/g, '').toLowerCase();
  return cleaned ? cleaned : null;
};

export const charsetFromContentType = (contentType: string | null | undefined): string | null => {
  if (!contentType) return null;
  const match = contentType.match(/charset\s*=\s*("?)([^";,\s]+)\1/i);
  return match ? normalizeLabel(match[2]) : null;
};

/**
 * Find a charset declared in the document head: `<meta charset="...">` or
 * `<meta http-equiv="Content-Type" content="text/html; charset=...">`.
 */
export const sniffMetaCharset = (body: Uint8Array): string | null => {
  const head = new TextDecoder('latin1').decode(body.subarray(0, SNIFF_BYTES));
  const direct = head.match(/<meta[^>]+charset\s*=\s*["']?([\w.:-]+)/i);
  return direct ? normalizeLabel(direct[1]) : null;
};

const tryDecode = (body: Uint8Array, label: string): string | null => {
  try {
    return new TextDecoder(label, { fatal: true }).decode(body);
  } catch {
    // Unknown label or bytes that do not fit the encoding.
    return null;
  }
};

export interface DecodedBody {
  text: string;
  encoding: string;
}

/**
 * Decode a response body using the encoding the response itself suggests.
 * Order: a specific header charset, the meta charset, strict UTF-8, a weak
 * header charset, strict GB18030, and finally lossy UTF-8.
 */
export const decodeBody = (body: Uint8Array, contentType: string | null | undefined): DecodedBody => {
  const headerCharset = charsetFromContentType(contentType);
  const weakHeader = headerCharset !== null && WEAK_CHARSETS.has(headerCharset);
  const metaCharset = sniffMetaCharset(body);

  const order: string[] = [];
  const push = (label: string | null) => {
    if (label && !order.includes(label)) order.push(label);
  };
  if (!weakHeader) push(headerCharset);
  push(metaCharset);
  push('utf-8');
  if (weakHeader) push(headerCharset);
  push('gb18030');

  for (const label of order) {
    const text = tryDecode(body, label);
    if (text !== null) {
      return { text, encoding: label };
    }
  }

  return { text: new TextDecoder('utf-8').decode(body), encoding: 'utf-8' };
};
