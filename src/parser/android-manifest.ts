/**
 * portcullis — AndroidManifest.xml 解析
 *
 * apktool（デコード済みマニフェスト）と androguard（axml）の双方が使う。
 * fast-xml-parser で XML を読み、セキュリティ上意味のある属性だけを抜き出す。
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { ensureArray, isRecord } from './guards.js';

export const COMPONENT_TAGS = ['activity', 'service', 'receiver', 'provider'] as const;
export type ComponentTag = (typeof COMPONENT_TAGS)[number];

export interface ExportedComponent {
  tag: ComponentTag;
  name: string;
}

export interface ManifestSummary {
  packageName?: string;
  debuggable: boolean;
  usesCleartextTraffic: boolean;
  permissions: string[];
  exportedComponents: ExportedComponent[];
}

const ARRAY_TAGS = new Set<string>(['uses-permission', ...COMPONENT_TAGS]);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseAttributeValue: false,
  isArray: (name) => ARRAY_TAGS.has(name),
});

function androidAttr(node: Record<string, unknown>, name: string): string | undefined {
  const value = node[`@_android:${name}`];
  return typeof value === 'string' ? value : undefined;
}

function isTrue(value: string | undefined): boolean {
  return value !== undefined && value.trim().toLowerCase() === 'true';
}

/**
 * マニフェスト XML を要約する。
 *
 * @throws Error XML として不正な場合、またはルートが manifest でない場合
 */
export function summarizeManifest(xml: string): ManifestSummary {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new Error(
      `invalid AndroidManifest.xml (line ${validation.err.line}): ${validation.err.msg}`,
    );
  }

  const parsed: unknown = xmlParser.parse(xml);
  const manifest = isRecord(parsed) ? parsed['manifest'] : undefined;
  if (!isRecord(manifest)) {
    throw new Error('invalid AndroidManifest.xml: missing <manifest> root');
  }

  const permissions: string[] = [];
  for (const perm of ensureArray(manifest['uses-permission'])) {
    if (!isRecord(perm)) continue;
    const name = androidAttr(perm, 'name');
    if (name !== undefined) permissions.push(name);
  }

  const application = isRecord(manifest['application']) ? manifest['application'] : {};
  const exportedComponents: ExportedComponent[] = [];
  for (const tag of COMPONENT_TAGS) {
    for (const component of ensureArray(application[tag])) {
      if (!isRecord(component)) continue;
      const name = androidAttr(component, 'name');
      if (name !== undefined && isTrue(androidAttr(component, 'exported'))) {
        exportedComponents.push({ tag, name });
      }
    }
  }

  const packageName = manifest['@_package'];
  return {
    ...(typeof packageName === 'string' ? { packageName } : {}),
    debuggable: isTrue(androidAttr(application, 'debuggable')),
    usesCleartextTraffic: isTrue(androidAttr(application, 'usesCleartextTraffic')),
    permissions,
    exportedComponents,
  };
}
