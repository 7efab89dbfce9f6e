import type { Logger } from "../logger.js";
import type { ChatCallbacks } from "../session.js";

export interface ChatClientOptions {
    /** Server host name or address. */
    host: string;
    port: number;
    /** Display name announced to the server and stamped on our chats. */
    username: string;
    /** Bounded wait for the server, in ms. Default: 10000. */
    connectTimeoutMs?: number;
    callbacks?: ChatCallbacks;
    logger?: Logger;
}
