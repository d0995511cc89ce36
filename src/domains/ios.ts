import type { DomainCatalog } from '../types/tool.js';
import { mobsfTool } from './mobsf.js';

export const iosCatalog: DomainCatalog = {
  domain: 'ios',
  tools: [mobsfTool],
  phases: [{ name: 'analysis', tools: ['mobsf'] }],
};
