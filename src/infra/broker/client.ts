/**
 * RabbitMQ Publisher
 *
 * Publishes messages over an AMQP 0-9-1 confirm channel.
 * The connection is opened lazily and reused until `close()`.
 */

import fs from 'node:fs/promises';

import amqp from 'amqplib';
import { ok, err, type Result } from 'neverthrow';

import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BrokerSettings {
  host: string;
  port: number;
  username?: string | undefined;
  password?: string | undefined;
  vhost: string;
  tls: {
    enabled: boolean;
    serverName?: string | undefined;
    certificatePath?: string | undefined;
    certificatePassphrase?: string | undefined;
  };
}

export interface BrokerConnectOptions {
  protocol: 'amqp' | 'amqps';
  hostname: string;
  port: number;
  username?: string;
  password?: string;
  vhost: string;
}

export interface BrokerSocketOptions {
  servername?: string;
  pfx?: Buffer;
  passphrase?: string;
}

export interface ReturnedMessage {
  properties: { messageId?: string | undefined };
}

export interface PublishProperties {
  persistent: boolean;
  mandatory: boolean;
  contentType: string;
  messageId: string;
  /** Unix seconds */
  timestamp: number;
  headers: Record<string, string>;
}

/**
 * The subset of an amqplib confirm channel used by the publisher.
 */
export interface BrokerChannel {
  publish(exchange: string, routingKey: string, content: Buffer, options?: PublishProperties): boolean;
  waitForConfirms(): Promise<void>;
  on(event: 'return', listener: (message: ReturnedMessage) => void): unknown;
  on(event: 'error' | 'close', listener: (error?: unknown) => void): unknown;
  close(): Promise<void>;
}

/**
 * The subset of an amqplib connection used by the publisher.
 */
export interface BrokerConnection {
  createConfirmChannel(): Promise<BrokerChannel>;
  on(event: 'error' | 'close', listener: (error?: unknown) => void): unknown;
  close(): Promise<void>;
}

export type BrokerConnectFn = (
  options: BrokerConnectOptions,
  socketOptions: BrokerSocketOptions
) => Promise<BrokerConnection>;

export interface BrokerError {
  type: 'CONNECTION' | 'PUBLISH' | 'UNROUTABLE';
  message: string;
}

export interface PublishParams {
  exchange: string;
  routingKey: string;
  body: string;
  messageId: string;
  contentType: string;
  headers: Record<string, string>;
}

/**
 * Broker publisher interface (port).
 */
export interface BrokerPublisher {
  publish(params: PublishParams): Promise<Result<void, BrokerError>>;
  /** Opens (or reuses) the connection without publishing */
  checkConnection(): Promise<Result<void, BrokerError>>;
  close(): Promise<void>;
}

export interface BrokerPublisherDeps {
  settings: BrokerSettings;
  logger: Logger;
  /** Defaults to amqplib's connect */
  connect?: BrokerConnectFn;
  /** Defaults to Date.now */
  now?: () => number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

const defaultConnect: BrokerConnectFn = (options, socketOptions) =>
  amqp.connect(options, socketOptions);

const toMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/**
 * Builds amqplib connect and socket options from settings.
 */
export const buildConnectOptions = async (
  settings: BrokerSettings
): Promise<{ options: BrokerConnectOptions; socketOptions: BrokerSocketOptions }> => {
  const options: BrokerConnectOptions = {
    protocol: settings.tls.enabled ? 'amqps' : 'amqp',
    hostname: settings.host,
    port: settings.port,
    vhost: settings.vhost,
    ...(settings.username !== undefined && { username: settings.username }),
    ...(settings.password !== undefined && { password: settings.password }),
  };

  const socketOptions: BrokerSocketOptions = {};
  if (settings.tls.enabled) {
    socketOptions.servername = settings.tls.serverName ?? settings.host;

    if (settings.tls.certificatePath !== undefined) {
      socketOptions.pfx = await fs.readFile(settings.tls.certificatePath);
      if (settings.tls.certificatePassphrase !== undefined) {
        socketOptions.passphrase = settings.tls.certificatePassphrase;
      }
    }
  }

  return { options, socketOptions };
};

export const makeBrokerPublisher = (deps: BrokerPublisherDeps): BrokerPublisher => {
  const { settings, logger } = deps;
  const connect = deps.connect ?? defaultConnect;
  const now = deps.now ?? Date.now;
  const log = logger.child({ component: 'BrokerPublisher' });

  let session: Promise<{ connection: BrokerConnection; channel: BrokerChannel }> | null = null;
  // Bumped per session so that late events from a replaced session are ignored
  let generation = 0;
  const returned = new Set<string>();

  const dropSession = (id: number): void => {
    if (id === generation) session = null;
  };

  const openSession = async (id: number) => {
    const { options, socketOptions } = await buildConnectOptions(settings);
    log.debug({ host: options.hostname, port: options.port, tls: settings.tls.enabled }, 'Connecting to broker');

    const connection = await connect(options, socketOptions);
    connection.on('error', (error) => {
      log.error({ error }, 'Broker connection error');
    });
    connection.on('close', () => {
      dropSession(id);
    });

    const channel = await connection.createConfirmChannel();
    channel.on('return', (message) => {
      const messageId = message.properties.messageId ?? '';
      log.warn({ messageId }, 'Message returned by broker (unroutable)');
      returned.add(messageId);
    });
    // The server closes the channel on errors such as a missing exchange;
    // pending confirms reject and the next publish opens a new session.
    channel.on('error', (error) => {
      log.error({ error }, 'Broker channel error');
    });
    channel.on('close', () => {
      if (id !== generation) return;
      session = null;
      connection.close().catch((error: unknown) => {
        log.debug({ error }, 'Broker connection already closed');
      });
    });

    log.info({ host: options.hostname, vhost: options.vhost }, 'Connected to broker');
    return { connection, channel };
  };

  const getSession = async () => {
    if (session === null) {
      generation += 1;
      const pending = openSession(generation);
      session = pending;
      // Allow the next call to reconnect after a failed attempt
      void pending.catch(() => {
        if (session === pending) session = null;
      });
    }
    return session;
  };

  return {
    async publish(params: PublishParams): Promise<Result<void, BrokerError>> {
      let channel: BrokerChannel;
      try {
        ({ channel } = await getSession());
      } catch (error) {
        log.error({ error }, 'Failed to connect to broker');
        return err({ type: 'CONNECTION', message: toMessage(error) });
      }

      try {
        channel.publish(params.exchange, params.routingKey, Buffer.from(params.body, 'utf-8'), {
          persistent: true,
          mandatory: true,
          contentType: params.contentType,
          messageId: params.messageId,
          timestamp: Math.floor(now() / 1000),
          headers: params.headers,
        });
        await channel.waitForConfirms();
      } catch (error) {
        log.error({ error, messageId: params.messageId }, 'Failed to publish message');
        return err({ type: 'PUBLISH', message: toMessage(error) });
      }

      if (returned.delete(params.messageId)) {
        return err({
          type: 'UNROUTABLE',
          message: `Message was returned as unroutable (exchange '${params.exchange}', routing key '${params.routingKey}')`,
        });
      }

      log.debug({ messageId: params.messageId }, 'Message published');
      return ok(undefined);
    },

    async checkConnection(): Promise<Result<void, BrokerError>> {
      try {
        await getSession();
        return ok(undefined);
      } catch (error) {
        return err({ type: 'CONNECTION', message: toMessage(error) });
      }
    },

    async close(): Promise<void> {
      if (session === null) return;
      const current = session;
      session = null;
      generation += 1;

      try {
        const { connection, channel } = await current;
        await channel.close();
        await connection.close();
      } catch (error) {
        log.warn({ error }, 'Failed to close broker connection cleanly');
      }
    },
  };
};
