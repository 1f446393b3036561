/**
 * Closed event model: one variant per packet kind plus connection lifecycle.
 * @module meshcore/events
 */
import type {Telemetry} from './lpp';
import type {
    BatteryStatus,
    Channel,
    ChannelMessage,
    Contact,
    ContactMessage,
    DeviceInfo,
    DeviceStatus,
    PublicKey,
    SelfInfo,
    StatsData,
} from './types';

export type ConnectedEvent = {type: 'connected'};
export type DisconnectedEvent = {type: 'disconnected'};

export type OkEvent = {type: 'ok'};
export type DeviceErrorEvent = {type: 'error'; message: string};
export type ContactListStartEvent = {type: 'contactListStart'; count: number};
export type ContactEvent = {type: 'contact'; contact: Contact};
export type ContactListEndEvent = {type: 'contactListEnd'; lastModified: number};
export type SelfInfoEvent = {type: 'selfInfo'; selfInfo: SelfInfo};
export type MessageSentEvent = {type: 'messageSent'; expectedAck: number; timeoutMs: number};
export type ContactMessageEvent = {type: 'contactMessage'; message: ContactMessage; v3: boolean};
export type ChannelMessageEvent = {type: 'channelMessage'; message: ChannelMessage; v3: boolean};
export type CurrentTimeEvent = {type: 'currentTime'; time: number};
export type NoMoreMessagesEvent = {type: 'noMoreMessages'};
export type ContactUriEvent = {type: 'contactUri'; uri: string};
export type BatteryEvent = {type: 'battery'; battery: BatteryStatus};
export type DeviceInfoEvent = {type: 'deviceInfo'; info: DeviceInfo};
export type PrivateKeyEvent = {type: 'privateKey'; key: Buffer};
export type DisabledEvent = {type: 'disabled'};
export type ChannelInfoEvent = {type: 'channelInfo'; channel: Channel};
export type SignStartedEvent = {type: 'signStarted'; maxLength: number};
export type SignatureEvent = {type: 'signature'; signature: Buffer};
export type CustomVarsEvent = {type: 'customVars'; raw: string; vars: Record<string, string>};
export type StatsEvent = {type: 'stats'; stats: StatsData};

export type AdvertisementEvent = {type: 'advertisement'; publicKey: PublicKey};
export type PathUpdateEvent = {type: 'pathUpdate'; publicKey: PublicKey};
export type AckEvent = {type: 'ack'; code: number};
export type MessagesWaitingEvent = {type: 'messagesWaiting'};
export type RawDataEvent = {type: 'rawData'; data: Buffer};
export type LoginSuccessEvent = {type: 'loginSuccess'};
export type LoginFailedEvent = {type: 'loginFailed'};
export type StatusResponseEvent = {type: 'statusResponse'; status: DeviceStatus};
export type LogDataEvent = {type: 'logData'; text: string};
export type TraceDataEvent = {type: 'traceData'; data: Buffer};
export type NewContactAdvertEvent = {type: 'newContactAdvert'; contact: Contact};
export type TelemetryResponseEvent = {type: 'telemetryResponse'; keyPrefix: Buffer | null; telemetry: Telemetry};
export type BinaryResponseEvent = {type: 'binaryResponse'; data: Buffer};
export type PathDiscoveryResponseEvent = {type: 'pathDiscoveryResponse'; data: Buffer};
export type ControlDataEvent = {type: 'controlData'; data: Buffer};

/** Undecodable or unknown packet. `packetType` is `null` for an empty payload. */
export type RawEvent = {type: 'raw'; packetType: number | null; data: Buffer};

export type MeshCoreEvent =
    | ConnectedEvent
    | DisconnectedEvent
    | OkEvent
    | DeviceErrorEvent
    | ContactListStartEvent
    | ContactEvent
    | ContactListEndEvent
    | SelfInfoEvent
    | MessageSentEvent
    | ContactMessageEvent
    | ChannelMessageEvent
    | CurrentTimeEvent
    | NoMoreMessagesEvent
    | ContactUriEvent
    | BatteryEvent
    | DeviceInfoEvent
    | PrivateKeyEvent
    | DisabledEvent
    | ChannelInfoEvent
    | SignStartedEvent
    | SignatureEvent
    | CustomVarsEvent
    | StatsEvent
    | AdvertisementEvent
    | PathUpdateEvent
    | AckEvent
    | MessagesWaitingEvent
    | RawDataEvent
    | LoginSuccessEvent
    | LoginFailedEvent
    | StatusResponseEvent
    | LogDataEvent
    | TraceDataEvent
    | NewContactAdvertEvent
    | TelemetryResponseEvent
    | BinaryResponseEvent
    | PathDiscoveryResponseEvent
    | ControlDataEvent
    | RawEvent;

export type MeshCoreEventType = MeshCoreEvent['type'];

/** Narrow the event union to the variant(s) with the given type tag(s). */
export type EventOf<T extends MeshCoreEventType> = Extract<MeshCoreEvent, {type: T}>;

export const isEventType = <T extends MeshCoreEventType>(
    event: MeshCoreEvent,
    ...types: T[]
): event is EventOf<T> => types.some((type) => type === event.type);
