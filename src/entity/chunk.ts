import {
  Column,
  CreateDateColumn,
  Entity,
  JoinColumn,
  ManyToOne,
  PrimaryColumn,
} from "typeorm";

import { Ledger } from "./ledger.js";

import type { Relation } from "typeorm";

@Entity("chunks")
export class Chunk {
  @PrimaryColumn({ name: "job_id", type: "varchar" })
  jobId!: string;
  @PrimaryColumn({ name: "chunk_index", type: "integer" })
  index!: number;

  @JoinColumn({ name: "job_id" })
  @ManyToOne(() => Ledger, (ledger) => ledger.chunks, { onDelete: "CASCADE" })
  ledger!: Relation<Ledger>;

  @Column({ type: "bigint" })
  length!: number;

  @Column({ type: "varchar" })
  checksum!: string;

  @CreateDateColumn({ name: "committed_at" })
  committedAt!: Date;
}
