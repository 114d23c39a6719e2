import { connect, type Options } from "amqplib";
import { AMQPS_PORT } from "@notifygate/config";
import { log } from "../logger.js";
import { DeadlineExceededError, withDeadline } from "../domain/utils/deadline.js";
import type { DelayProvider } from "../domain/utils/delay.js";
import type { NotificationJob } from "../types/index.js";
import { waitForBroker, type TcpProbe } from "./readiness-probe.js";
import {
  DEAD_LETTER_EXCHANGE,
  FAILED_QUEUE,
  NOTIFICATION_EXCHANGE,
  QUEUE_BINDINGS,
} from "./topology.js";

/** The subset of an amqplib confirm channel the publisher drives. */
export interface BrokerChannel {
  assertExchange(exchange: string, type: string, options?: Options.AssertExchange): Promise<unknown>;
  assertQueue(queue: string, options?: Options.AssertQueue): Promise<unknown>;
  bindQueue(queue: string, source: string, pattern: string): Promise<unknown>;
  publish(exchange: string, routingKey: string, content: Buffer, options?: Options.Publish): boolean;
  waitForConfirms(): Promise<void>;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (error?: Error) => void): unknown;
}

/** The subset of an amqplib connection the publisher drives. */
export interface BrokerConnection {
  createConfirmChannel(): Promise<BrokerChannel>;
  close(): Promise<void>;
  on(event: "close" | "error", listener: (error?: Error) => void): unknown;
}

export interface SocketOptions {
  /** Socket connect and handshake timeout in ms */
  timeout?: number;
  rejectUnauthorized?: boolean;
}

export type BrokerConnector = (url: string, socketOptions: SocketOptions) => Promise<BrokerConnection>;

interface OpenedBroker {
  connection: BrokerConnection;
  channel: BrokerChannel;
}

const amqpConnector: BrokerConnector = (url, socketOptions) => connect(url, socketOptions);

export interface MessagePublisherOptions {
  /** amqp:// or amqps:// URL */
  url: string;
  /** Probed for reachability before each connect */
  host: string;
  port: number;
  exchange?: string;
  connectRetries?: number;
  probeBaseDelayMs?: number;
  probeTimeoutMs?: number;
  /** Budget for connect, channel and topology once the port is open (default: 10000) */
  connectTimeoutMs?: number;
  connector?: BrokerConnector;
  probe?: TcpProbe;
  delayProvider?: DelayProvider;
}

/**
 * Publishes notification jobs onto the durable per-type queues.
 *
 * One connection and one confirm channel per process, shared by every
 * publish. A closed channel or connection is dropped and the next publish
 * runs the full connect sequence again (probe, connect, declare topology);
 * concurrent publishes wait on the same connect attempt.
 */
export class MessagePublisher {
  private connection: BrokerConnection | null = null;
  private channel: BrokerChannel | null = null;
  private connecting: Promise<BrokerChannel> | null = null;
  private isClosing = false;

  private readonly exchange: string;
  private readonly connector: BrokerConnector;
  private readonly connectTimeoutMs: number;

  constructor(private readonly options: MessagePublisherOptions) {
    this.exchange = options.exchange ?? NOTIFICATION_EXCHANGE;
    this.connector = options.connector ?? amqpConnector;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 10000;
  }

  /**
   * Probe the broker, open the connection and declare the topology.
   *
   * @throws BrokerUnreachableError if the probe budget runs out,
   * DeadlineExceededError if the broker accepts the socket but does not
   * finish opening in time, or the connect/declare error
   */
  async connect(): Promise<void> {
    await this.acquireChannel();
  }

  /**
   * Publish `job` persistently and wait for the broker's confirm.
   * Reconnects first if there is no open channel. Errors propagate.
   */
  async publish(routingKey: string, job: NotificationJob): Promise<void> {
    const channel = await this.acquireChannel();

    channel.publish(this.exchange, routingKey, Buffer.from(JSON.stringify(job)), {
      persistent: true,
      contentType: "application/json",
      headers: {
        correlation_id: job.correlation_id,
        notification_id: job.notification_id,
      },
    });
    await channel.waitForConfirms();

    log.broker.info({ routingKey, notificationId: job.notification_id }, "published");
  }

  isConnected(): boolean {
    return this.channel !== null;
  }

  async close(): Promise<void> {
    this.isClosing = true;
    const { channel, connection } = this;
    this.channel = null;
    this.connection = null;

    try {
      await channel?.close();
      await connection?.close();
      log.broker.info({}, "broker connection closed");
    } catch (error) {
      log.broker.warn({ error: error instanceof Error ? error.message : String(error) }, "error closing broker connection");
    }
  }

  private async acquireChannel(): Promise<BrokerChannel> {
    if (this.channel) {
      return this.channel;
    }

    if (!this.connecting) {
      this.isClosing = false;
      this.connecting = this.establish().finally(() => {
        this.connecting = null;
      });
    }

    return this.connecting;
  }

  private async establish(): Promise<BrokerChannel> {
    const { host, port } = this.options;

    await waitForBroker({
      host,
      port,
      attempts: this.options.connectRetries,
      baseDelayMs: this.options.probeBaseDelayMs,
      timeoutMs: this.options.probeTimeoutMs,
      probe: this.options.probe,
      delayProvider: this.options.delayProvider,
    });

    // The TLS listener may present a self-signed or mismatched chain
    const tls = port === AMQPS_PORT;
    const socketOptions: SocketOptions = tls
      ? { timeout: this.connectTimeoutMs, rejectUnauthorized: false }
      : { timeout: this.connectTimeoutMs };

    // An open port does not mean the broker speaks AMQP yet; a handshake
    // that stalls must not hold every waiting publish forever
    const opening = this.open(socketOptions);
    let opened: OpenedBroker;
    try {
      opened = await withDeadline(opening, this.connectTimeoutMs, "broker connect");
    } catch (error) {
      if (error instanceof DeadlineExceededError) {
        void opening
          .then(({ connection }) => connection.close())
          .catch((lateError: unknown) => {
            log.broker.debug({
              error: lateError instanceof Error ? lateError.message : String(lateError),
            }, "abandoned broker connect ended with an error");
          });
      }
      throw error;
    }

    this.connection = opened.connection;
    this.channel = opened.channel;
    log.broker.info({ host, port, tls, exchange: this.exchange }, "broker connected");
    return opened.channel;
  }

  private async open(socketOptions: SocketOptions): Promise<OpenedBroker> {
    const connection = await this.connector(this.options.url, socketOptions);

    connection.on("error", (error) => {
      log.broker.error({ error: error?.message }, "broker connection error");
    });
    connection.on("close", () => {
      if (this.connection === connection) {
        this.connection = null;
        this.channel = null;
      }
      if (!this.isClosing) {
        log.broker.warn({}, "broker connection closed, will reconnect on next publish");
      }
    });

    try {
      const channel = await connection.createConfirmChannel();

      channel.on("error", (error) => {
        log.broker.error({ error: error?.message }, "broker channel error");
      });
      channel.on("close", () => {
        if (this.channel === channel) {
          this.channel = null;
        }
      });

      await this.declareTopology(channel);
      return { connection, channel };
    } catch (error) {
      await connection.close().catch((closeError: unknown) => {
        log.broker.warn({
          error: closeError instanceof Error ? closeError.message : String(closeError),
        }, "failed to close half-open broker connection");
      });
      throw error;
    }
  }

  /** Every declaration is durable and safe to repeat on reconnect. */
  private async declareTopology(channel: BrokerChannel): Promise<void> {
    await channel.assertExchange(this.exchange, "direct", { durable: true });
    await channel.assertExchange(DEAD_LETTER_EXCHANGE, "fanout", { durable: true });

    await channel.assertQueue(FAILED_QUEUE, { durable: true });
    await channel.bindQueue(FAILED_QUEUE, DEAD_LETTER_EXCHANGE, "");

    for (const { queue, routingKey } of Object.values(QUEUE_BINDINGS)) {
      await channel.assertQueue(queue, {
        durable: true,
        arguments: { "x-dead-letter-exchange": DEAD_LETTER_EXCHANGE },
      });
      await channel.bindQueue(queue, this.exchange, routingKey);
    }

    log.broker.debug({ exchange: this.exchange }, "topology declared");
  }
}
