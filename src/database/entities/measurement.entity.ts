import {
  Entity,
  Column,
  PrimaryColumn,
  PrimaryGeneratedColumn,
  Index,
  CreateDateColumn,
} from 'typeorm';

/**
 * Measurement Entity - append-only, partitioned by kind
 *
 * The physical table is `PARTITION BY LIST (kind)` with one partition per
 * enabled kind (`measurements_<kind>`), so each kind's readings live in
 * their own table while queries and inserts go through the parent.
 * TypeORM cannot synchronize partitioned tables; the DDL lives in
 * MeasurementSchemaService and this entity only maps the columns.
 *
 * Composite Primary Key: [kind, id]
 * - PostgreSQL requires the partition key in every unique constraint
 * - `id` comes from one sequence shared by all partitions, so it also
 *   encodes global insertion order (used to break timestamp ties)
 *
 * Rows are never updated or deleted.
 */
@Entity('measurements', { synchronize: false })
@Index('idx_measurements_kind_timestamp', ['kind', 'timestamp', 'id'])
export class Measurement {
  /**
   * Measurement kind token, e.g. 'power'. Partition key.
   */
  @PrimaryColumn({ type: 'varchar', length: 32 })
  kind!: string;

  /**
   * Record identity (bigserial). The pg driver returns bigint as string.
   */
  @PrimaryGeneratedColumn({ type: 'bigint' })
  id!: string;

  /**
   * Normalized value in the kind's unit.
   */
  @Column({ type: 'double precision' })
  value!: number;

  /**
   * Time of the reading (UTC enforced via timestamptz).
   */
  @Column({ type: 'timestamptz' })
  timestamp!: Date;

  /**
   * Originating device or sensor identifier.
   */
  @Column({ type: 'varchar', length: 128, nullable: true })
  source!: string | null;

  /**
   * Insertion time. Set by the database on insert.
   */
  @CreateDateColumn({ type: 'timestamptz' })
  createdAt!: Date;
}
