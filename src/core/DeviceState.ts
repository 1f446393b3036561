/**
 * Cached device self-description and contact set.
 * @module core/DeviceState
 */
import type {MeshCoreEvent} from '../protocols/meshcore/events';
import type {Contact, PublicKey, SelfInfo} from '../protocols/meshcore/types';

const copyContact = (contact: Contact): Contact => ({...contact, path: Buffer.from(contact.path)});

const copySelfInfo = (info: SelfInfo): SelfInfo => ({
    ...info,
    telemetryMode: {...info.telemetryMode},
    radio: {...info.radio},
});

/**
 * State derived from observed events. Only the frame pump calls
 * {@link DeviceState.apply}; every getter returns a copy.
 */
export class DeviceState {
    private selfInfo: SelfInfo | null = null;
    private readonly contacts = new Map<string, Contact>();

    /**
     * Fold one event into the cache.
     * @returns `true` when the event changed cached state.
     */
    public apply(event: MeshCoreEvent): boolean {
        switch (event.type) {
            case 'selfInfo':
                this.selfInfo = copySelfInfo(event.selfInfo);
                return true;
            case 'contact':
            case 'newContactAdvert':
                this.contacts.set(event.contact.publicKey.toHex(), copyContact(event.contact));
                return true;
            default:
                return false;
        }
    }

    public getSelfInfo(): SelfInfo | null {
        return this.selfInfo ? copySelfInfo(this.selfInfo) : null;
    }

    /** Snapshot keyed by lowercase public key hex. */
    public getContacts(): Map<string, Contact> {
        const snapshot = new Map<string, Contact>();
        for (const [key, contact] of this.contacts) snapshot.set(key, copyContact(contact));
        return snapshot;
    }

    public getContact(key: PublicKey | string): Contact | null {
        const hex = typeof key === 'string' ? key.toLowerCase() : key.toHex();
        const contact = this.contacts.get(hex);
        return contact ? copyContact(contact) : null;
    }

    /**
     * Look up a contact by the leading key bytes carried in messages.
     * Returns the first match; prefixes are assumed unique among known contacts.
     */
    public findContactByPrefix(prefix: Buffer | Uint8Array): Contact | null {
        for (const contact of this.contacts.values()) {
            if (contact.publicKey.matchesPrefix(prefix)) return copyContact(contact);
        }
        return null;
    }

    public findContactByName(name: string): Contact | null {
        for (const contact of this.contacts.values()) {
            if (contact.name === name) return copyContact(contact);
        }
        return null;
    }

    public get contactCount(): number {
        return this.contacts.size;
    }
}
