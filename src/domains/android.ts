/**
 * portcullis — Android static analysis catalog
 *
 * Each tool receives one APK (fan-out each). The package is bind-mounted
 * read-only, so `{input.target}` expands to its container path.
 */

import type { DomainCatalog } from '../types/tool.js';
import { mobsfTool } from './mobsf.js';

export const androidCatalog: DomainCatalog = {
  domain: 'android',
  tools: [
    {
      name: 'apktool',
      version: '2.10.0',
      image: 'portcullis/apktool:2.10.0',
      consumes: ['target'],
      produces: ['asset', 'finding'],
      fanOut: 'each',
      args: ['d', '{input.target}', '-o', '{outputDir}/decoded', '-f'],
      outputFile: 'decoded/AndroidManifest.xml',
      parser: 'apktool',
    },
    {
      name: 'jadx',
      version: '1.5.1',
      image: 'portcullis/jadx:1.5.1',
      consumes: ['target'],
      produces: ['asset', 'finding'],
      fanOut: 'each',
      args: ['{input.target}', '{output}'],
      outputFile: 'jadx.json',
      parser: 'jadx',
    },
    {
      name: 'androguard',
      version: '4.1.2',
      image: 'portcullis/androguard:4.1.2',
      consumes: ['target'],
      produces: ['asset', 'finding'],
      fanOut: 'each',
      args: ['{input.target}', '{output}'],
      outputFile: 'androguard.json',
      parser: 'androguard',
    },
    mobsfTool,
  ],
  phases: [
    { name: 'static', tools: ['apktool', 'jadx', 'androguard'] },
    { name: 'analysis', tools: ['mobsf'] },
  ],
};
