/**
 * MeshCore companion-radio protocol constants.
 * @module meshcore/constants
 *
 * Protocol references:
 * - MeshCore companion radio USB/serial framing
 * - Cayenne LPP sensor telemetry encoding
 */
export const MESHCORE_FRAME_MARKER_OUT = 0x3c;
export const MESHCORE_FRAME_MARKER_IN = 0x3e;
export const MESHCORE_FRAME_HEADER_SIZE = 3;
export const MESHCORE_MAX_FRAME_SIZE = 65535;

export const MESHCORE_DEFAULT_BAUD_RATE = 115200;
export const MESHCORE_DEFAULT_TIMEOUT_MS = 5000;
export const MESHCORE_DEFAULT_SETTLE_MS = 50;
export const MESHCORE_DEFAULT_CONNECT_DELAY_MS = 200;
export const MESHCORE_DEFAULT_SUBSCRIBER_CAPACITY = 256;
export const MESHCORE_DEFAULT_CLIENT_NAME = 'mccli';
export const MESHCORE_APP_PROTOCOL_VERSION = 0x03;

export const PUBLIC_KEY_SIZE = 32;
export const PUBLIC_KEY_PREFIX_SIZE = 6;
export const PRIVATE_KEY_SIZE = 64;
export const CONTACT_PATH_SIZE = 64;
export const CONTACT_NAME_SIZE = 32;
export const CHANNEL_NAME_SIZE = 32;
export const CHANNEL_SECRET_SIZE = 16;
export const FLOOD_SCOPE_KEY_SIZE = 16;
export const COORDINATE_SCALE = 1e6;
export const SNR_SCALE = 4;

/** Packet kinds selected by the first payload byte. Values >= 0x80 are pushes. */
export enum PacketType {
    Ok = 0x00,
    Error = 0x01,
    ContactStart = 0x02,
    Contact = 0x03,
    ContactEnd = 0x04,
    SelfInfo = 0x05,
    MsgSent = 0x06,
    ContactMsgRecv = 0x07,
    ChannelMsgRecv = 0x08,
    CurrentTime = 0x09,
    NoMoreMsgs = 0x0a,
    ContactUri = 0x0b,
    Battery = 0x0c,
    DeviceInfo = 0x0d,
    PrivateKey = 0x0e,
    Disabled = 0x0f,
    ContactMsgRecvV3 = 0x10,
    ChannelMsgRecvV3 = 0x11,
    ChannelInfo = 0x12,
    SignStart = 0x13,
    Signature = 0x14,
    CustomVars = 0x15,
    Stats = 0x18,
    BinaryReq = 0x32,
    FactoryReset = 0x33,
    PathDiscovery = 0x34,
    SetFloodScope = 0x36,
    SendControlData = 0x37,
    Advertisement = 0x80,
    PathUpdate = 0x81,
    Ack = 0x82,
    MessagesWaiting = 0x83,
    RawData = 0x84,
    LoginSuccess = 0x85,
    LoginFailed = 0x86,
    StatusResponse = 0x87,
    LogData = 0x88,
    TraceData = 0x89,
    PushNewAdvert = 0x8a,
    TelemetryResponse = 0x8b,
    BinaryResponse = 0x8c,
    PathDiscoveryResponse = 0x8d,
    ControlData = 0x8e,
}

/** Outbound command opcodes. */
export enum CommandOpcode {
    AppStart = 0x01,
    SendMessage = 0x02,
    SendChannelMsg = 0x03,
    GetContacts = 0x04,
    GetTime = 0x05,
    SetTime = 0x06,
    SendAdvert = 0x07,
    SetName = 0x08,
    UpdateContact = 0x09,
    GetMessage = 0x0a,
    SetRadio = 0x0b,
    SetTxPower = 0x0c,
    ResetPath = 0x0d,
    SetCoords = 0x0e,
    RemoveContact = 0x0f,
    ShareContact = 0x10,
    ExportContact = 0x11,
    ImportContact = 0x12,
    Reboot = 0x13,
    GetBattery = 0x14,
    SetTuning = 0x15,
    DeviceQuery = 0x16,
    ExportPrivateKey = 0x17,
    ImportPrivateKey = 0x18,
    SendLogin = 0x1a,
    SendStatusReq = 0x1b,
    SendLogout = 0x1d,
    GetChannel = 0x1f,
    SetChannel = 0x20,
    SignStart = 0x21,
    SignData = 0x22,
    SignFinish = 0x23,
    SendTrace = 0x24,
    SetDevicePin = 0x25,
    SetOtherParams = 0x26,
    Telemetry = 0x27,
    GetCustomVars = 0x28,
    SetCustomVar = 0x29,
    BinaryReq = 0x32,
    PathDiscovery = 0x34,
    SetFloodScope = 0x36,
    SendControlData = 0x37,
    GetStats = 0x38,
}

export enum MessageType {
    Private = 0x00,
    Command = 0x01,
}

export enum TextType {
    Plain = 0x00,
    Command = 0x01,
    Signed = 0x02,
}

export enum ContactType {
    Unknown = 0x00,
    Node = 0x01,
    Repeater = 0x02,
    Room = 0x03,
}

/** Bit flags carried in a contact's flags byte. */
export const ContactFlags = {
    Trusted: 0x01,
    Hidden: 0x02,
} as const;

export enum BinaryReqType {
    Status = 0x01,
    KeepAlive = 0x02,
    Telemetry = 0x03,
    Mma = 0x04,
    Acl = 0x05,
    Neighbours = 0x06,
}

export enum StatsType {
    Core = 0x00,
    Radio = 0x01,
    Packets = 0x02,
}

export enum ControlDataType {
    NodeDiscoverReq = 0x80,
}

/** Cayenne LPP record type codes. */
export enum LppType {
    DigitalInput = 0,
    DigitalOutput = 1,
    AnalogInput = 2,
    AnalogOutput = 3,
    Illuminance = 101,
    Presence = 102,
    Temperature = 103,
    Humidity = 104,
    Accelerometer = 113,
    Barometer = 115,
    Voltage = 116,
    Current = 117,
    Frequency = 118,
    Percentage = 120,
    Altitude = 121,
    Power = 128,
    Distance = 130,
    Energy = 131,
    Direction = 132,
    UnixTime = 133,
    Gyrometer = 134,
    Colour = 135,
    Gps = 136,
}

export const isPushPacket = (packetType: number): boolean => packetType >= 0x80;
