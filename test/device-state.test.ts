import {describe, expect, it} from 'vitest';

import {decodePacket, DeviceState, PacketType} from '../src';
import {contactBody, keyBytes, keyOf, packet, selfInfoBody} from './builders';

const contactEvent = (seed: number, name: string, kind = PacketType.Contact) =>
    decodePacket(packet(kind, contactBody({seed, name, pathLength: 1, path: [0xaa]})));

describe('DeviceState', () => {
    it('caches self info from the handshake', () => {
        const state = new DeviceState();
        expect(state.getSelfInfo()).toBeNull();
        expect(state.apply(decodePacket(packet(PacketType.SelfInfo, selfInfoBody())))).toBe(true);
        expect(state.getSelfInfo()?.name).toBe('base-node');
        expect(state.getSelfInfo()?.publicKey.equals(keyOf(0x10))).toBe(true);
    });

    it('keeps the last write per public key', () => {
        const state = new DeviceState();
        state.apply(contactEvent(0x30, 'relay-1'));
        state.apply(contactEvent(0x40, 'roof'));
        state.apply(contactEvent(0x30, 'relay-2', PacketType.PushNewAdvert));

        expect(state.contactCount).toBe(2);
        expect(state.getContact(keyOf(0x30))?.name).toBe('relay-2');
        expect([...state.getContacts().keys()]).toEqual([keyBytes(0x30).toString('hex'), keyBytes(0x40).toString('hex')]);
    });

    it('ignores events that carry no state', () => {
        const state = new DeviceState();
        expect(state.apply({type: 'ok'})).toBe(false);
        expect(state.apply({type: 'ack', code: 1})).toBe(false);
        expect(state.contactCount).toBe(0);
    });

    it('returns copies', () => {
        const state = new DeviceState();
        state.apply(contactEvent(0x30, 'relay-1'));

        const contact = state.getContact(keyOf(0x30));
        if (!contact) throw new Error('contact missing');
        contact.name = 'changed';
        contact.path[0] = 0x00;

        expect(state.getContact(keyOf(0x30))?.name).toBe('relay-1');
        expect(state.getContact(keyOf(0x30))?.path).toEqual(Buffer.from([0xaa]));
    });

    it('looks contacts up by hex, prefix and name', () => {
        const state = new DeviceState();
        state.apply(contactEvent(0x30, 'relay-1'));
        state.apply(contactEvent(0x40, 'roof'));

        expect(state.getContact(keyBytes(0x40).toString('hex').toUpperCase())?.name).toBe('roof');
        expect(state.findContactByPrefix(keyBytes(0x40).subarray(0, 6))?.name).toBe('roof');
        expect(state.findContactByPrefix(Buffer.from([0x99]))).toBeNull();
        expect(state.findContactByName('relay-1')?.publicKey.equals(keyOf(0x30))).toBe(true);
        expect(state.findContactByName('missing')).toBeNull();
    });
});
