import { Entity, PrimaryGeneratedColumn, Column, CreateDateColumn, Index } from 'typeorm';

// course_code is copied from the catalog, not a foreign key: a plan may name
// a course the catalog does not (or no longer) carry.
@Entity('user_plans')
@Index('idx_user_plans_user_term', ['userId', 'year', 'quarter'])
export class UserPlan {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'user_id', type: 'text' })
  userId!: string; // SSO login or email

  @Column({ type: 'text' })
  quarter!: string;

  @Column({ type: 'text', nullable: true })
  year?: string | null;

  @Column({ name: 'course_code', type: 'text' })
  courseCode!: string;

  @Column({ type: 'integer', nullable: true })
  units?: number | null;

  @Column({ type: 'text', nullable: true })
  type?: string | null; // Major, GE, Elective

  // nullable as in the SQL schema; rows written through TypeORM always get a timestamp
  @CreateDateColumn({ name: 'created_at', nullable: true })
  createdAt!: Date | null;
}
