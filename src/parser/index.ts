import type { ToolParser } from '../types/parser.js';
import { androguardParser } from './androguard-parser.js';
import { apktoolParser } from './apktool-parser.js';
import { ffufParser } from './ffuf-parser.js';
import { graphqlCopParser } from './graphql-cop-parser.js';
import { httpxParser, httpxPathsParser } from './httpx-parser.js';
import { jadxParser } from './jadx-parser.js';
import {
  dnsxParser,
  gauParser,
  hakrawlerParser,
  katanaParser,
  paramspiderParser,
  subfinderParser,
  waybackurlsParser,
} from './line-list-parser.js';
import { mobsfParser } from './mobsf-parser.js';
import { nucleiParser } from './nuclei-parser.js';

/** Every parser shipped with portcullis, registered by key at startup. */
export const BUILTIN_PARSERS: readonly ToolParser[] = [
  subfinderParser,
  dnsxParser,
  httpxParser,
  httpxPathsParser,
  gauParser,
  waybackurlsParser,
  katanaParser,
  hakrawlerParser,
  ffufParser,
  paramspiderParser,
  graphqlCopParser,
  nucleiParser,
  apktoolParser,
  jadxParser,
  androguardParser,
  mobsfParser,
];
