import { describe, it, expect } from 'vitest';
import { mobsfParser } from '../../src/parser/mobsf-parser.js';

function buildReport(overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({
    file_name: 'shop.apk',
    package_name: 'com.example.shop',
    manifest_analysis: {
      manifest_findings: [
        {
          rule: 'android_backup',
          title: 'Application Data can be Backed up',
          severity: 'warning',
          description: 'android:allowBackup is not set',
        },
      ],
    },
    code_analysis: {
      findings: {
        android_logging: {
          files: { 'com/example/shop/Api.java': '12,40', 'com/example/shop/Db.java': '7' },
          metadata: {
            description: 'The App logs information.',
            severity: 'info',
            cwe: 'CWE-532',
            'owasp-mobile': 'M1',
          },
        },
        android_weak_hash: {
          metadata: { severity: 'high' },
        },
      },
    },
    network_security: {
      network_findings: [{ scope: ['*'], description: 'Base config allows cleartext', severity: 'high' }],
    },
    certificate_analysis: {
      certificate_findings: [
        ['warning', 'Application is signed with v1 signature scheme', 'Signed Application'],
        ['bad'],
      ],
    },
    ...overrides,
  });
}

describe('mobsfParser', () => {
  it('4 つのセクションから finding を抽出する', () => {
    expect(mobsfParser.parse(buildReport())).toEqual([
      {
        kind: 'finding',
        asset: 'com.example.shop',
        title: 'Application Data can be Backed up',
        category: 'manifest',
        severity: 'warning',
        evidence: { rule: 'android_backup', description: 'android:allowBackup is not set' },
      },
      {
        kind: 'finding',
        asset: 'com.example.shop',
        title: 'The App logs information.',
        category: 'code',
        severity: 'info',
        occurrences: 2,
        evidence: {
          rule: 'android_logging',
          cwe: 'CWE-532',
          owasp: 'M1',
          files: { 'com/example/shop/Api.java': '12,40', 'com/example/shop/Db.java': '7' },
        },
      },
      {
        kind: 'finding',
        asset: 'com.example.shop',
        title: 'android_weak_hash',
        category: 'code',
        severity: 'high',
        occurrences: 1,
        evidence: { rule: 'android_weak_hash', files: {} },
      },
      {
        kind: 'finding',
        asset: 'com.example.shop',
        title: 'Network Security Issue',
        category: 'network',
        severity: 'high',
        evidence: { description: 'Base config allows cleartext', scope: ['*'] },
      },
      {
        kind: 'finding',
        asset: 'com.example.shop',
        title: 'Signed Application',
        category: 'certificate',
        severity: 'warning',
        evidence: { description: 'Application is signed with v1 signature scheme' },
      },
    ]);
  });

  it('iOS レポートは bundle_id を asset にする', () => {
    const raw = JSON.stringify({
      file_name: 'shop.ipa',
      bundle_id: 'com.example.shop.ios',
      certificate_analysis: { certificate_findings: [['', 'No description', 'Cert']] },
    });

    expect(mobsfParser.parse(raw)).toEqual([
      {
        kind: 'finding',
        asset: 'com.example.shop.ios',
        title: 'Cert',
        category: 'certificate',
        severity: 'info',
        evidence: { description: 'No description' },
      },
    ]);
  });

  it('識別子がなければ mobile-app', () => {
    const raw = JSON.stringify({
      network_security: { network_findings: [{ severity: 'secure' }] },
    });
    expect(mobsfParser.parse(raw)[0]?.asset).toBe('mobile-app');
  });

  it('ルートがオブジェクトでなければエラー', () => {
    expect(() => mobsfParser.parse('"report"')).toThrow('mobsf JSON: root must be an object');
  });
});
