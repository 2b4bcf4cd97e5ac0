import { ConfigurationError, hexToBytes, errorMessage } from '@meshack/shared';
import type { MeshNode, NodeConfigValue } from './types.js';
import { NotFoundError } from './errors.js';

/**
 * Parses a node number written as a decimal integer, a decimal string or a
 * Meshtastic `!hex` identifier.
 */
export function parseNodeId(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new ConfigurationError(`Invalid node id: ${value}`);
    }
    return value;
  }

  const text = value.trim();
  if (text.startsWith('!')) {
    const hex = text.slice(1);
    if (!/^[0-9a-fA-F]{1,8}$/.test(hex)) {
      throw new ConfigurationError(`Invalid node id: ${value}`);
    }
    return parseInt(hex, 16);
  }
  if (!/^\d+$/.test(text)) {
    throw new ConfigurationError(`Invalid node id: ${value}`);
  }
  return parseNodeId(Number(text));
}

/**
 * Read-only mapping from logical node name to network identifier.
 */
export class NodeDirectory {
  private readonly byName = new Map<string, MeshNode>();
  private readonly byId = new Map<number, MeshNode>();

  constructor(nodes: MeshNode[]) {
    for (const node of nodes) {
      if (this.byName.has(node.name)) {
        throw new ConfigurationError(`Duplicate node name: ${node.name}`);
      }
      const frozen: MeshNode = Object.freeze({
        name: node.name,
        id: node.id,
        publicKey: node.publicKey ? Uint8Array.from(node.publicKey) : undefined,
      });
      this.byName.set(node.name, frozen);
      if (!this.byId.has(node.id)) {
        this.byId.set(node.id, frozen);
      }
    }
  }

  static fromConfig(nodes: Record<string, NodeConfigValue>): NodeDirectory {
    const definitions: MeshNode[] = Object.entries(nodes).map(
      ([name, value]) => {
        if (typeof value === 'number' || typeof value === 'string') {
          return { name, id: parseNodeId(value) };
        }
        let publicKey: Uint8Array | undefined;
        if (value.publicKey) {
          try {
            publicKey = hexToBytes(value.publicKey);
          } catch (error) {
            throw new ConfigurationError(
              `Invalid public key for node ${name}: ${errorMessage(error)}`
            );
          }
        }
        return { name, id: parseNodeId(value.id), publicKey };
      }
    );
    return new NodeDirectory(definitions);
  }

  resolve(name: string): MeshNode {
    const node = this.byName.get(name);
    if (!node) {
      throw new NotFoundError('Node', name);
    }
    return node;
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  findById(id: number): MeshNode | undefined {
    return this.byId.get(id);
  }

  list(): MeshNode[] {
    return Array.from(this.byName.values());
  }

  get size(): number {
    return this.byName.size;
  }

  /**
   * When the local radio is itself listed, every other node receives the
   * telemetry; otherwise only the selected node does.
   */
  recipientsFor(
    localNodeId: number | undefined,
    selectedName: string | undefined
  ): MeshNode[] {
    const self =
      localNodeId === undefined ? undefined : this.findById(localNodeId);
    if (self) {
      return this.list().filter(node => node.id !== self.id);
    }

    if (selectedName && this.byName.has(selectedName)) {
      return [this.resolve(selectedName)];
    }

    const first = this.list()[0];
    return first ? [first] : [];
  }
}
