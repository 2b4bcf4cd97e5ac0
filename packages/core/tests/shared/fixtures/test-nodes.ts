import type { NodeConfigValue } from '../../../src/types.js';

export const LOCAL_NODE_ID = 0x1000;
export const YANG_ID = 0x9e757a8c;
export const YING_ID = 0x9e7596b4;
export const REMOTE_ACKER_ID = 555;

export const TEST_NODE_CONFIG: Record<string, NodeConfigValue> = {
  yang: '!9e757a8c',
  ying: YING_ID,
};
