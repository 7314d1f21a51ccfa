import { Injectable } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, type Observable, Subject } from "rxjs";
import { LEDGER_TRANSITION_ID, type LedgerTransition } from "./ledger.event";

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly events$ = new Subject<LedgerTransition>();

	ledgerEvents(identity?: string): Observable<LedgerTransition> {
		if (identity) {
			return this.events$.pipe(filter((e) => e.identity === identity));
		}
		return this.events$.asObservable();
	}

	@OnEvent(LEDGER_TRANSITION_ID)
	onLedgerTransition(evt: LedgerTransition) {
		this.events$.next(evt);
	}
}
