import { Injectable, OnModuleDestroy } from "@nestjs/common";
import { RealtimeEvent } from "@tapau/types";
import { Observable, Subject, filter } from "rxjs";

/** In-process bus between the order flow and the socket gateway. */
@Injectable()
export class RealtimeEventsService implements OnModuleDestroy {
  private readonly bus = new Subject<RealtimeEvent>();
  readonly events$: Observable<RealtimeEvent> = this.bus.asObservable();

  publish(event: RealtimeEvent): void {
    this.bus.next(event);
  }

  forActor(actorKey: string): Observable<RealtimeEvent> {
    return this.events$.pipe(filter((event) => event.targetActorKeys.includes(actorKey)));
  }

  onModuleDestroy(): void {
    this.bus.complete();
  }
}
