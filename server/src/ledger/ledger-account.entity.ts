import {
	Column,
	CreateDateColumn,
	Entity,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";

/**
 * Latest committed balances per identity. Amounts are decimal strings since
 * they exceed what SQLite integers hold.
 */
@Entity("ledger_accounts")
export class LedgerAccount {
	@PrimaryColumn({ type: "text" })
	identity!: string;

	@Column({ type: "text", default: "0" })
	collateral!: string;

	@Column({ type: "text", default: "0" })
	debt!: string;

	@Column({ type: "text", default: "0" })
	pendingCredit!: string;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
