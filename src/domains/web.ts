/**
 * portcullis — Web reconnaissance catalog
 *
 * discovery → resolution → enumeration → vulnerability.
 * Every web tool is scope-filtered: discovered hosts outside scope never
 * reach a later phase.
 */

import type { DomainCatalog } from '../types/tool.js';

export const webCatalog: DomainCatalog = {
  domain: 'web',
  tools: [
    // ---------------- discovery ----------------
    {
      name: 'subfinder',
      version: '2.6.6',
      image: 'portcullis/subfinder:2.6.6',
      consumes: ['target'],
      produces: ['asset'],
      fanOut: 'batch',
      args: ['-dL', '{input.target}', '-all', '-silent', '-o', '{output}'],
      outputFile: 'subfinder.txt',
      hardDependency: true,
      parser: 'subfinder',
      scopeFiltered: true,
    },

    // ---------------- resolution ----------------
    {
      name: 'dnsx',
      version: '1.2.1',
      image: 'portcullis/dnsx:1.2.1',
      consumes: ['asset'],
      produces: ['asset'],
      fanOut: 'batch',
      args: ['-l', '{input.asset}', '-silent', '-o', '{output}'],
      outputFile: 'dnsx.txt',
      parser: 'dnsx',
      scopeFiltered: true,
    },
    {
      name: 'httpx',
      version: '1.6.9',
      image: 'portcullis/httpx:1.6.9',
      consumes: ['asset'],
      produces: ['asset'],
      fanOut: 'batch',
      args: ['-l', '{input.asset}', '-json', '-silent', '-o', '{output}'],
      outputFile: 'httpx.json',
      parser: 'httpx',
      scopeFiltered: true,
    },

    // ---------------- enumeration ----------------
    {
      name: 'gau',
      version: '2.2.4',
      image: 'portcullis/gau:2.2.4',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['--providers', 'wayback,commoncrawl,otx', '--subs', '--o', '{output}', '--input', '{input.asset}'],
      outputFile: 'gau.txt',
      parser: 'gau',
      scopeFiltered: true,
    },
    {
      name: 'waybackurls',
      version: '0.1.0',
      image: 'portcullis/waybackurls:0.1.0',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['-input', '{input.asset}'],
      parser: 'waybackurls',
      scopeFiltered: true,
    },
    {
      name: 'katana',
      version: '1.1.2',
      image: 'portcullis/katana:1.1.2',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['-list', '{input.asset}', '-silent', '-o', '{output}'],
      outputFile: 'katana.txt',
      parser: 'katana',
      scopeFiltered: true,
    },
    {
      name: 'hakrawler',
      version: '2.1.0',
      image: 'portcullis/hakrawler:2.1.0',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['-subs', '-input', '{input.asset}'],
      parser: 'hakrawler',
      scopeFiltered: true,
    },
    {
      name: 'ffuf',
      version: '2.1.0',
      image: 'portcullis/ffuf:2.1.0',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: [
        '-w', '{input.asset}:HOST',
        '-w', '{wordlists}/common.txt:FUZZ',
        '-u', 'https://HOST/FUZZ',
        '-mc', '200,204,301,302,307,401,403',
        '-of', 'json',
        '-o', '{output}',
        '-timeout', '10',
        '-t', '20',
        '-sa',
        '-s',
      ],
      outputFile: 'ffuf.json',
      parser: 'ffuf',
      scopeFiltered: true,
    },
    {
      name: 'paramspider',
      version: '1.0.1',
      image: 'portcullis/paramspider:1.0.1',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['-l', '{input.asset}', '-o', '{output}'],
      outputFile: 'paramspider.txt',
      parser: 'paramspider',
      scopeFiltered: true,
    },
    {
      name: 'graphql-cop',
      version: '1.14.0',
      image: 'portcullis/graphql-cop:1.14.0',
      consumes: ['asset'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['--list', '{input.asset}', '--quiet'],
      parser: 'graphql-cop',
      scopeFiltered: true,
    },

    // ---------------- vulnerability ----------------
    {
      name: 'httpx_paths',
      version: '1.6.9',
      image: 'portcullis/httpx:1.6.9',
      consumes: ['path'],
      produces: ['path'],
      fanOut: 'batch',
      args: ['-l', '{input.path}', '-json', '-silent', '-o', '{output}'],
      outputFile: 'httpx_paths.json',
      parser: 'httpx_paths',
      scopeFiltered: true,
    },
    {
      name: 'nuclei',
      version: '3.3.7',
      image: 'portcullis/nuclei:3.3.7',
      consumes: ['asset'],
      produces: ['finding'],
      fanOut: 'batch',
      args: ['-l', '{input.asset}', '-jsonl', '-silent', '-o', '{output}'],
      outputFile: 'nuclei.jsonl',
      timeoutMs: 1_800_000,
      parser: 'nuclei',
      scopeFiltered: true,
    },
  ],
  phases: [
    { name: 'discovery', tools: ['subfinder'] },
    { name: 'resolution', tools: ['dnsx', 'httpx'] },
    {
      name: 'enumeration',
      tools: ['gau', 'waybackurls', 'katana', 'hakrawler', 'ffuf', 'paramspider', 'graphql-cop'],
    },
    { name: 'vulnerability', tools: ['httpx_paths', 'nuclei'] },
  ],
};
