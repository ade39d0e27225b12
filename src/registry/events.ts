import type { Address } from '../lib/address.js';
import type { Hex } from '../lib/encoding.js';

export type RegistryEvent =
  | {
      type: 'AssertionAdded';
      text: string;
      freshnessWindow: number;
      expiryWindow: number;
      requiresGateway: boolean;
      gateway: Address;
      controller: Address;
      assertionId: Hex;
      revokeId: Hex;
    }
  | { type: 'NewController'; assertionId: Hex; oldController: Address; newController: Address }
  | { type: 'NewGateway'; assertionId: Hex; oldGateway: Address; newGateway: Address }
  | { type: 'AssertionStopped'; assertionId: Hex }
  | { type: 'AssertionUnStopped'; assertionId: Hex }
  | { type: 'Attested'; assertionId: Hex; subject: Address; signedAt: number }
  | { type: 'Revoked'; assertionId: Hex; subject: Address }
  | { type: 'Blocked'; address: Address }
  | { type: 'UnBlocked'; address: Address }
  | { type: 'NewTipAmount'; oldAmount: bigint; newAmount: bigint }
  | { type: 'TipReceived'; sender: Address; amount: bigint }
  | { type: 'TipOut'; amount: bigint }
  | { type: 'NewOverrider'; oldOverrider: Address; newOverrider: Address }
  | { type: 'NewTipCollector'; oldTipCollector: Address; newTipCollector: Address }
  | { type: 'OwnershipTransferred'; previousOwner: Address; newOwner: Address };

export type RegistryEventType = RegistryEvent['type'];

export type RegistryListener = (event: RegistryEvent) => void;

/** One line per event: `Event Attested assertionId=0x.. subject=0x.. signedAt=..` */
export function formatEvent(event: RegistryEvent): string {
  const { type, ...fields } = event;
  const parts = Object.entries(fields).map(([k, v]) => `${k}=${typeof v === 'string' ? JSON.stringify(v) : String(v)}`);
  return [`Event ${type}`, ...parts].join(' ');
}
