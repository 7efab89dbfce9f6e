export {
    type Message,
    type MessageKind,
    type DecodeResult,
    type Envelope,
    type Ack,
    MESSAGE_KINDS,
    PROTOCOL_VERSION,
    SERVER_SENDER,
    encodeMessage,
    decodeMessage,
    createMessage,
    createChatMessage,
    createConnectMessage,
    createDisconnectMessage,
    createStatusMessage,
    createErrorMessage,
    createTestMessage,
    echoTestMessage,
    encodeEnvelope,
    decodeEnvelope,
    encodeAck,
    decodeAck,
} from "./message.js";
export { MAX_FRAME_SIZE, encodeFrame, frameMessage, FrameDecoder, type FrameDecoderState } from "./framing.js";
export {
    ChatError,
    type ChatErrorCode,
    MalformedMessageError,
    UnknownMessageKindError,
    FrameTooLargeError,
    PeerUnreachableError,
    TransportResetError,
    SendFailureError,
    NotConnectedError,
    ConfigError,
} from "./errors.js";
export { ReliableChannel, type ReliableChannelOptions, type RetryOptions, type PendingSend, type Inbound } from "./reliable.js";
export {
    Session,
    type SessionOptions,
    type SessionState,
    type PeerInfo,
    type PeerLink,
    type ChatCallbacks,
    type TransportProtocol,
    defaultPeerName,
    WELCOME_PREFIX,
} from "./session.js";
export { SequenceWindow } from "./sequence-window.js";
export { type ChatServer, type ChatServerOptions, type ServerStatus } from "./server/types.js";
export { StreamChatServer, type StreamChatServerOptions } from "./server/stream.js";
export { DatagramChatServer, type DatagramChatServerOptions } from "./server/datagram.js";
export { type ChatClientOptions } from "./client/types.js";
export { StreamChatClient, type StreamChatClientOptions } from "./client/stream.js";
export { DatagramChatClient, type DatagramChatClientOptions } from "./client/datagram.js";
export { type SocketDecorator } from "./transport/stream.js";
export { type DatagramEndpoint, type PeerAddress, addressKey } from "./transport/types.js";
export { UdpEndpoint, type UdpEndpointOptions } from "./transport/udp.js";
export { MemoryDatagramNetwork, MemoryDatagramEndpoint, seededRandom } from "./transport/memory.js";
export { type ChatConfig, DEFAULT_CONFIG, loadConfig, retryCeiling, retryOptions } from "./config.js";
export { type Logger, type LogLevel, createLogger, silentLogger } from "./logger.js";
