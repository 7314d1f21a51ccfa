import { Column, CreateDateColumn, Entity, Index, PrimaryColumn } from "typeorm";
import type { LedgerEventKind } from "@collateral-ledger/ledger";

@Entity("ledger_events")
export class LedgerEntry {
	@PrimaryColumn({ type: "integer" })
	sequence!: number;

	@Column({ type: "text" })
	kind!: LedgerEventKind;

	@Index()
	@Column({ type: "text" })
	identity!: string;

	@Column({ type: "text" })
	amount!: string;

	@CreateDateColumn()
	createdAt!: Date;
}
