import type { Domain, DomainCatalog } from '../types/tool.js';
import { androidCatalog } from './android.js';
import { iosCatalog } from './ios.js';
import { webCatalog } from './web.js';

const CATALOGS: Record<Domain, DomainCatalog> = {
  web: webCatalog,
  android: androidCatalog,
  ios: iosCatalog,
};

export function catalogFor(domain: Domain): DomainCatalog {
  return CATALOGS[domain];
}

/** Accepted package extension per app domain. */
export const PACKAGE_EXTENSIONS: Record<Exclude<Domain, 'web'>, string> = {
  android: '.apk',
  ios: '.ipa',
};
