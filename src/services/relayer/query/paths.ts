import type { Height } from '../../../types/ibc';

// Commitment store keys
export const paths = {
    clientState: (clientId: string) => `clients/${clientId}/clientState`,
    consensusState: (clientId: string, height: Height) =>
        `clients/${clientId}/consensusStates/${height.revisionNumber}-${height.revisionHeight}`,
    connection: (connectionId: string) => `connections/${connectionId}`,
    channelEnd: (portId: string, channelId: string) => `channelEnds/ports/${portId}/channels/${channelId}`,
    nextSequenceSend: (portId: string, channelId: string) => `nextSequenceSend/ports/${portId}/channels/${channelId}`,
    nextSequenceRecv: (portId: string, channelId: string) => `nextSequenceRecv/ports/${portId}/channels/${channelId}`,
    nextSequenceAck: (portId: string, channelId: string) => `nextSequenceAck/ports/${portId}/channels/${channelId}`,
    packetCommitment: (portId: string, channelId: string, sequence: number) =>
        `commitments/ports/${portId}/channels/${channelId}/sequences/${sequence}`,
    packetReceipt: (portId: string, channelId: string, sequence: number) =>
        `receipts/ports/${portId}/channels/${channelId}/sequences/${sequence}`,
    packetAcknowledgement: (portId: string, channelId: string, sequence: number) =>
        `acks/ports/${portId}/channels/${channelId}/sequences/${sequence}`,
};
