import {
  Column,
  CreateDateColumn,
  Entity,
  OneToMany,
  PrimaryColumn,
} from "typeorm";

import { Chunk } from "./chunk.js";

@Entity("ledgers")
export class Ledger {
  @PrimaryColumn({ name: "job_id", type: "varchar" })
  jobId!: string;

  @Column({ name: "file_size", type: "bigint" })
  fileSize!: number;
  @Column({ name: "chunk_size", type: "bigint" })
  chunkSize!: number;

  @CreateDateColumn({ name: "created_at" })
  createdAt!: Date;

  @OneToMany(() => Chunk, (chunk: Chunk) => chunk.ledger)
  chunks!: Promise<Chunk[]>;
}
