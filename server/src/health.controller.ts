import { Controller, Get } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";

import { LedgerJournalService } from "./ledger/ledger-journal.service";

export type HealthStatus =
	| { status: "ok" }
	| { status: "degraded"; journalHaltedAt: number };

@ApiTags("Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(private readonly journal: LedgerJournalService) {}

	@Get()
	@ApiOperation({ summary: "Liveness probe" })
	@ApiOkResponse({
		description:
			"Service is up; degraded once the journal has stopped persisting events",
	})
	check(): HealthStatus {
		const haltedAt = this.journal.haltedAt;
		if (haltedAt !== undefined) {
			return { status: "degraded", journalHaltedAt: haltedAt };
		}
		return { status: "ok" };
	}
}
