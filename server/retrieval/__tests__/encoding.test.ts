import { describe, expect, it } from 'vitest';
import { charsetFromContentType, decodeBody, sniffMetaCharset } from '../encoding';

const utf8 = (text: string) => new TextEncoder().encode(text);
const latin1Bytes = (text: string) => Uint8Array.from(text, (char) => char.charCodeAt(0));
const concat = (...parts: Uint8Array[]) => {
  const out = new Uint8Array(parts.reduce((sum, part) => sum + part.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
};

// "中文" in GBK / GB18030
const GBK_ZHONGWEN = Uint8Array.from([0xd6, 0xd0, 0xce, 0xc4]);

describe('charsetFromContentType', () => {
  it('reads quoted and unquoted labels', () => {
    expect(charsetFromContentType('text/html; charset="Shift_JIS"')).toBe('shift_jis');
    expect(charsetFromContentType('text/html;charset=UTF-8')).toBe('utf-8');
    expect(charsetFromContentType('text/html')).toBeNull();
    expect(charsetFromContentType(null)).toBeNull();
  });
});

describe('sniffMetaCharset', () => {
  it('finds both meta forms', () => {
    expect(sniffMetaCharset(utf8('<head><meta charset="GB2312"></head>'))).toBe('gb2312');
    expect(
      sniffMetaCharset(utf8('<meta http-equiv="Content-Type" content="text/html; charset=big5">')),
    ).toBe('big5');
    expect(sniffMetaCharset(utf8('<p>no meta</p>'))).toBeNull();
  });
});

describe('decodeBody', () => {
  it('uses a specific header charset first', () => {
    expect(decodeBody(GBK_ZHONGWEN, 'text/html; charset=gbk')).toEqual({ text: '中文', encoding: 'gbk' });
  });

  it('falls back to the meta charset when the header has none', () => {
    const body = concat(latin1Bytes('<meta charset="gb2312">'), GBK_ZHONGWEN);
    expect(decodeBody(body, 'text/html')).toEqual({ text: '<meta charset="gb2312">中文', encoding: 'gb2312' });
  });

  it('tries UTF-8 before a weak header charset', () => {
    expect(decodeBody(utf8('café'), 'text/html; charset=ISO-8859-1')).toEqual({ text: 'café', encoding: 'utf-8' });
  });

  it('detects GB18030 when strict UTF-8 fails', () => {
    expect(decodeBody(GBK_ZHONGWEN, null)).toEqual({ text: '中文', encoding: 'gb18030' });
  });

  it('skips unknown labels', () => {
    expect(decodeBody(utf8('plain'), 'text/html; charset=x-made-up')).toEqual({ text: 'plain', encoding: 'utf-8' });
  });

  it('decodes lossily when nothing fits', () => {
    expect(decodeBody(Uint8Array.from([0x61, 0xff]), null)).toEqual({ text: 'a\uFFFD', encoding: 'utf-8' });
  });
});
