export {
  SimulatedMeshTransport,
  type SimulatedMeshConfig,
  type SimulatedDelivery,
  type SentPacket,
} from './protocol.js';
