import { describe, it, expect } from 'vitest';
import { androguardParser } from '../../src/parser/androguard-parser.js';

const AXML = `<manifest xmlns:android="http://schemas.android.com/apk/res/android" package="com.example.shop">
  <uses-permission android:name="android.permission.INTERNET"/>
  <uses-permission android:name="android.permission.READ_SMS"/>
  <application android:debuggable="true"/>
</manifest>`;

describe('androguardParser', () => {
  it('マニフェスト・危険な権限・署名を finding にする', () => {
    const raw = JSON.stringify({
      axml: AXML,
      sign: 'APK is signed\nIs signed v1: False\nIs signed v2: True\n',
    });

    expect(androguardParser.parse(raw)).toEqual([
      {
        kind: 'finding',
        asset: 'AndroidManifest.xml',
        title: 'Application is debuggable',
        category: 'manifest',
        severity: 'medium',
      },
      {
        kind: 'finding',
        asset: 'android.permission.READ_SMS',
        title: 'Dangerous Android permission requested',
        category: 'permission',
        severity: 'medium',
        evidence: { permission: 'android.permission.READ_SMS' },
      },
      {
        kind: 'finding',
        asset: 'APK',
        title: 'APK is not v1 signed',
        category: 'signing',
        severity: 'low',
      },
    ]);
  });

  it('axml も sign もなければ空', () => {
    expect(androguardParser.parse('{}')).toEqual([]);
  });

  it('ルートがオブジェクトでなければエラー', () => {
    expect(() => androguardParser.parse('[]')).toThrow('androguard JSON: root must be an object');
  });
});
