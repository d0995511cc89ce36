import type { ToolDescriptorInput } from '../types/tool.js';

/** MobSF static analysis, shared by the android and ios catalogs. */
export const mobsfTool: ToolDescriptorInput = {
  name: 'mobsf',
  version: '4.2.9',
  image: 'portcullis/mobsf:4.2.9',
  consumes: ['target'],
  produces: ['finding'],
  fanOut: 'each',
  args: ['{input.target}', '{output}'],
  outputFile: 'mobsf.json',
  timeoutMs: 1_800_000,
  hardDependency: true,
  parser: 'mobsf',
};
