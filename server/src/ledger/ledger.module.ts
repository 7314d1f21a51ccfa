import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { LedgerAccount } from "./ledger-account.entity";
import { LedgerEntry } from "./ledger-entry.entity";
import { LedgerJournalService } from "./ledger-journal.service";
import { LedgerService } from "./ledger.service";
import { LedgerController } from "./ledger.controller";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { CallerGuard } from "../caller/caller.guard";

@Module({
	imports: [TypeOrmModule.forFeature([LedgerAccount, LedgerEntry])],
	providers: [
		LedgerService,
		LedgerJournalService,
		ServerSentEventsService,
		CallerGuard,
	],
	controllers: [LedgerController],
	exports: [LedgerService, LedgerJournalService],
})
export class LedgerModule {}
