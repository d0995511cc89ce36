/**
 * portcullis — 行リスト形式パーサー
 *
 * subfinder / dnsx / katana / gau / waybackurls / hakrawler / paramspider は
 * 1 行 1 値を出力する。重複行は occurrences に加算する。
 */

import type { FindingKind } from '../types/entities.js';
import type { ParsedRecord, ToolParser } from '../types/parser.js';

export interface LineListOptions {
  key: string;
  kind: Extract<FindingKind, 'asset' | 'path'>;
  title: string;
  category: string;
  /** host: 先頭トークンを小文字化し末尾ドットを除く / url: scheme+host を持つ URL のみ */
  value: 'host' | 'url' | 'raw';
}

function hasSchemeAndHost(line: string): boolean {
  try {
    const url = new URL(line);
    return url.protocol !== '' && url.host !== '';
  } catch {
    return false;
  }
}

function toValue(line: string, mode: LineListOptions['value']): string | undefined {
  const trimmed = line.trim();
  if (trimmed === '') return undefined;
  switch (mode) {
    case 'host': {
      const token = trimmed.split(/\s+/, 1)[0] ?? '';
      const host = token.toLowerCase().replace(/\.+$/, '');
      return host === '' ? undefined : host;
    }
    case 'url':
      return hasSchemeAndHost(trimmed) ? trimmed : undefined;
    case 'raw':
      return trimmed;
  }
}

export function createLineListParser(options: LineListOptions): ToolParser {
  return {
    key: options.key,
    parse(raw: string): ParsedRecord[] {
      const counts = new Map<string, number>();
      for (const line of raw.split('\n')) {
        const value = toValue(line, options.value);
        if (value === undefined) continue;
        counts.set(value, (counts.get(value) ?? 0) + 1);
      }

      return [...counts].map(([value, occurrences]) => ({
        kind: options.kind,
        asset: value,
        title: options.title,
        category: options.category,
        occurrences,
      }));
    },
  };
}

export const subfinderParser = createLineListParser({
  key: 'subfinder',
  kind: 'asset',
  title: 'Discovered subdomain',
  category: 'subdomain',
  value: 'host',
});

export const dnsxParser = createLineListParser({
  key: 'dnsx',
  kind: 'asset',
  title: 'Resolvable domain',
  category: 'dns',
  value: 'host',
});

export const katanaParser = createLineListParser({
  key: 'katana',
  kind: 'path',
  title: 'Discovered URL',
  category: 'crawl',
  value: 'raw',
});

export const gauParser = createLineListParser({
  key: 'gau',
  kind: 'path',
  title: 'Historical URL',
  category: 'historical-url',
  value: 'url',
});

export const waybackurlsParser = createLineListParser({
  key: 'waybackurls',
  kind: 'path',
  title: 'Historical endpoint (Wayback)',
  category: 'historical-url',
  value: 'raw',
});

export const hakrawlerParser = createLineListParser({
  key: 'hakrawler',
  kind: 'path',
  title: 'Discovered path (hakrawler)',
  category: 'crawl',
  value: 'raw',
});

export const paramspiderParser = createLineListParser({
  key: 'paramspider',
  kind: 'path',
  title: 'Discovered parameter (paramspider)',
  category: 'parameter',
  value: 'raw',
});
