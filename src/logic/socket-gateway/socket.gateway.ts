import {
  ConnectedSocket,
  MessageBody,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  WebSocketGateway,
  WebSocketServer,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';

export const sessionRoom = (sessionId: string) => `session:${sessionId}`;

function parseString(value: unknown): string | undefined {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value.trim();
  }
  return undefined;
}

/** Session id from the handshake `auth` payload, else from the query string. */
export function sessionIdFromHandshake(handshake: { auth?: Record<string, unknown>; query?: Record<string, unknown> }): string | undefined {
  return parseString(handshake.auth?.sessionId) ?? parseString(handshake.query?.sessionId);
}

@WebSocketGateway({
  cors: {
    origin: true,
    credentials: false,
  },
})
@Injectable()
export class SocketGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SocketGateway.name);

  @WebSocketServer()
  public server!: Server;

  async handleConnection(client: Socket) {
    const sessionId = sessionIdFromHandshake(client.handshake);
    if (sessionId) {
      await client.join(sessionRoom(sessionId));
    }

    client.emit('connection:ack', {
      socketId: client.id,
      sessionId: sessionId ?? null,
    });
  }

  handleDisconnect(client: Socket) {
    this.logger.debug(`Socket ${client.id} disconnected`);
  }

  /** Lets a connected client follow another session, e.g. after starting a new one. */
  @SubscribeMessage('session:join')
  async handleJoin(@ConnectedSocket() client: Pick<Socket, 'join'>, @MessageBody() body: unknown) {
    const sessionId = parseString(body) ?? (typeof body === 'object' && body !== null && 'sessionId' in body ? parseString(body.sessionId) : undefined);
    if (!sessionId) {
      return { joined: false };
    }
    await client.join(sessionRoom(sessionId));
    return { joined: true, sessionId };
  }

  emitToSession(sessionId: string, event: string, data: unknown): void {
    this.server.to(sessionRoom(sessionId)).emit(event, data);
  }
}
