import { Logger, OnModuleDestroy, OnModuleInit } from "@nestjs/common";
import { OnGatewayConnection, OnGatewayDisconnect, WebSocketGateway, WebSocketServer } from "@nestjs/websockets";
import { RealtimeEvent } from "@tapau/types";
import { Subscription } from "rxjs";
import { Server, Socket } from "socket.io";
import { actorRoleFor } from "../audit/actor-role";
import { RealtimeEventsService } from "./realtime-events.service";

export const REALTIME_EVENT = "realtime:event";

/** The room a socket joins, or null when the handshake names no customer, vendor, driver or admin. */
export function roomForHandshake(actorKey: unknown): string | null {
  if (typeof actorKey !== "string") return null;
  const key = actorKey.trim();
  return actorRoleFor(key) === "system" || key.endsWith(":") ? null : key;
}

/**
 * Each socket joins the room named by its `actorKey` handshake parameter.
 * Order events go only to the rooms listed in their target keys.
 */
@WebSocketGateway({ namespace: "/realtime", cors: { origin: "*" } })
export class RealtimeGateway implements OnGatewayConnection, OnGatewayDisconnect, OnModuleInit, OnModuleDestroy {
  @WebSocketServer()
  server!: Server;

  private readonly logger = new Logger(RealtimeGateway.name);
  private subscription?: Subscription;

  constructor(private readonly realtime: RealtimeEventsService) {}

  onModuleInit(): void {
    this.subscription = this.realtime.events$.subscribe((event: RealtimeEvent) => {
      if (event.targetActorKeys.length === 0) return;
      // socket.io delivers once per socket across the listed rooms
      this.server.to(event.targetActorKeys).emit(REALTIME_EVENT, event);
    });
  }

  onModuleDestroy(): void {
    this.subscription?.unsubscribe();
  }

  async handleConnection(client: Socket): Promise<void> {
    const room = roomForHandshake(client.handshake.query.actorKey);
    if (!room) {
      this.logger.warn(`Socket ${client.id} rejected: missing or unknown actorKey`);
      client.disconnect(true);
      return;
    }
    await client.join(room);
    this.logger.log(`Socket ${client.id} joined ${room}`);
  }

  handleDisconnect(client: Socket): void {
    this.logger.log(`Socket ${client.id} disconnected`);
  }
}
