import {
  Column,
  CreateDateColumn,
  Entity,
  PrimaryColumn,
  UpdateDateColumn,
} from 'typeorm';
import { SessionStatus } from '../catalog/session-status';

export type ArtifactKind = 'video' | 'audio' | 'transcript' | 'summary';

@Entity('sessions')
export class Session {
  @PrimaryColumn('varchar', { length: 128 })
  tenantId!: string;

  @PrimaryColumn('varchar', { length: 128 })
  sessionId!: string;

  @Column('int', { nullable: true })
  expectedSegmentCount!: number | null;

  @Column('int', { nullable: true })
  totalDurationSeconds!: number | null;

  @Column('varchar', { length: 32, default: 'recording' })
  status!: SessionStatus;

  @Column('varchar', { length: 256, nullable: true })
  executionHandle!: string | null;

  @Column('text', { nullable: true })
  videoLocation!: string | null;

  @Column('text', { nullable: true })
  audioLocation!: string | null;

  @Column('text', { nullable: true })
  transcriptLocation!: string | null;

  @Column('text', { nullable: true })
  summaryLocation!: string | null;

  @Column('simple-json', { nullable: true })
  missingIndices!: number[] | null;

  @Column('varchar', { length: 256, nullable: true })
  transcriptionJobName!: string | null;

  // ISO-8601; kept as text so the same schema runs on every driver
  @Column('varchar', { length: 32, nullable: true })
  nextCheckAfter!: string | null;

  @Column('text', { nullable: true })
  errorDetail!: string | null;

  @Column('varchar', { length: 32, nullable: true })
  pipelineVersion!: string | null;

  @Column('varchar', { length: 32, nullable: true })
  completedAt!: string | null;

  @Column('varchar', { length: 32, nullable: true })
  declaredAt!: string | null;

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}

export const ARTIFACT_COLUMNS = {
  video: 'videoLocation',
  audio: 'audioLocation',
  transcript: 'transcriptLocation',
  summary: 'summaryLocation',
} as const satisfies Record<ArtifactKind, keyof Session>;
