/**
 * Asterisk WS Kit — ARI Event Types
 *
 * ARI events arrive as JSON objects discriminated by `type`. The kinds
 * most Stasis apps react to are modelled in `AriEventMap`; anything
 * else still reaches catch-all and predicate handlers as a plain
 * `AriEvent`. Field sets follow the ARI event schema and stay open
 * (index signature), since Asterisk versions add fields freely.
 */

// ─── Payload Objects ────────────────────────────────────────────

export interface AriCallerId {
    name: string;
    number: string;
}

export interface AriDialplanCep {
    context: string;
    exten: string;
    priority: number;
    app_name?: string;
    app_data?: string;
}

export interface AriChannel {
    id: string;
    name: string;
    state?: string;
    caller?: AriCallerId;
    connected?: AriCallerId;
    dialplan?: AriDialplanCep;
    creationtime?: string;
    language?: string;
    channelvars?: Record<string, string>;
    [field: string]: unknown;
}

export interface AriBridge {
    id: string;
    name: string;
    technology?: string;
    bridge_type?: string;
    bridge_class?: string;
    channels?: string[];
    [field: string]: unknown;
}

export interface AriPlayback {
    id: string;
    media_uri: string;
    target_uri: string;
    state: string;
    [field: string]: unknown;
}

// ─── Events ─────────────────────────────────────────────────────

/** Fields every ARI event carries, plus whatever the event type adds */
export interface AriEvent {
    type: string;
    application?: string;
    timestamp?: string;
    asterisk_id?: string;
    [field: string]: unknown;
}

export interface StasisStartEvent extends AriEvent {
    type: 'StasisStart';
    channel: AriChannel;
    args: string[];
    replace_channel?: AriChannel;
}

export interface StasisEndEvent extends AriEvent {
    type: 'StasisEnd';
    channel: AriChannel;
}

export interface DialEvent extends AriEvent {
    type: 'Dial';
    peer: AriChannel;
    caller?: AriChannel;
    dialstatus: string;
    dialstring?: string;
    forward?: string;
}

export interface ChannelStateChangeEvent extends AriEvent {
    type: 'ChannelStateChange';
    channel: AriChannel;
}

export interface ChannelDestroyedEvent extends AriEvent {
    type: 'ChannelDestroyed';
    channel: AriChannel;
    cause: number;
    cause_txt: string;
}

export interface ChannelHangupRequestEvent extends AriEvent {
    type: 'ChannelHangupRequest';
    channel: AriChannel;
    cause?: number;
    soft?: boolean;
}

export interface ChannelVarsetEvent extends AriEvent {
    type: 'ChannelVarset';
    variable: string;
    value: string;
    channel?: AriChannel;
}

export interface ChannelDtmfReceivedEvent extends AriEvent {
    type: 'ChannelDtmfReceived';
    channel: AriChannel;
    digit: string;
    duration_ms: number;
}

export interface ChannelEnteredBridgeEvent extends AriEvent {
    type: 'ChannelEnteredBridge';
    bridge: AriBridge;
    channel: AriChannel;
}

export interface ChannelLeftBridgeEvent extends AriEvent {
    type: 'ChannelLeftBridge';
    bridge: AriBridge;
    channel: AriChannel;
}

export interface BridgeCreatedEvent extends AriEvent {
    type: 'BridgeCreated';
    bridge: AriBridge;
}

export interface BridgeDestroyedEvent extends AriEvent {
    type: 'BridgeDestroyed';
    bridge: AriBridge;
}

export interface PlaybackStartedEvent extends AriEvent {
    type: 'PlaybackStarted';
    playback: AriPlayback;
}

export interface PlaybackFinishedEvent extends AriEvent {
    type: 'PlaybackFinished';
    playback: AriPlayback;
}

export interface AriEventMap {
    StasisStart: StasisStartEvent;
    StasisEnd: StasisEndEvent;
    Dial: DialEvent;
    ChannelStateChange: ChannelStateChangeEvent;
    ChannelDestroyed: ChannelDestroyedEvent;
    ChannelHangupRequest: ChannelHangupRequestEvent;
    ChannelVarset: ChannelVarsetEvent;
    ChannelDtmfReceived: ChannelDtmfReceivedEvent;
    ChannelEnteredBridge: ChannelEnteredBridgeEvent;
    ChannelLeftBridge: ChannelLeftBridgeEvent;
    BridgeCreated: BridgeCreatedEvent;
    BridgeDestroyed: BridgeDestroyedEvent;
    PlaybackStarted: PlaybackStartedEvent;
    PlaybackFinished: PlaybackFinishedEvent;
}

export type AriEventType = keyof AriEventMap;

export type EventHandler<E extends AriEvent = AriEvent> = (event: E) => void | Promise<void>;

export type EventPredicate = (event: AriEvent) => boolean;

// ─── Handler Registry ───────────────────────────────────────────

interface Registration {
    matches: EventPredicate;
    handler: EventHandler;
}

/**
 * Handlers in registration order. Keyed registrations, predicate
 * registrations and catch-alls share one list so that dispatch order is
 * the order in which handlers were added.
 */
export class EventHandlerRegistry {
    private readonly registrations: Registration[] = [];

    on<K extends AriEventType>(type: K, handler: EventHandler<AriEventMap[K]>): () => void {
        // The `type` check is what makes the payload an AriEventMap[K]
        return this.add((event) => event.type === type, (event) => handler(event as AriEventMap[K]));
    }

    onMatch(predicate: EventPredicate, handler: EventHandler): () => void {
        return this.add(predicate, handler);
    }

    onAny(handler: EventHandler): () => void {
        return this.add(() => true, handler);
    }

    /** Snapshot of handlers for an event; later (un)registrations do not affect it */
    match(event: AriEvent): EventHandler[] {
        return this.registrations
            .filter((registration) => registration.matches(event))
            .map((registration) => registration.handler);
    }

    get size(): number {
        return this.registrations.length;
    }

    clear(): void {
        this.registrations.length = 0;
    }

    private add(matches: EventPredicate, handler: EventHandler): () => void {
        const registration: Registration = { matches, handler };
        this.registrations.push(registration);
        return () => {
            const index = this.registrations.indexOf(registration);
            if (index !== -1) this.registrations.splice(index, 1);
        };
    }
}

// ─── Helpers ────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(value: unknown, field: string): string | null {
    if (!isRecord(value)) return null;
    const found = value[field];
    return typeof found === 'string' ? found : null;
}

/**
 * One-line summary for logs: "<type> <bridge name or id> <channel name>".
 */
export function describeEvent(event: AriEvent): string {
    const parts = [event.type];

    const bridgeName = stringField(event['bridge'], 'name') || stringField(event['bridge'], 'id');
    if (bridgeName) parts.push(bridgeName);

    const channelName = stringField(event['channel'], 'name') ?? stringField(event['peer'], 'name');
    if (channelName) parts.push(channelName);

    return parts.join(' ');
}
