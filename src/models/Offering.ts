import { Entity, PrimaryGeneratedColumn, Column, ManyToOne, JoinColumn, Index } from 'typeorm';
import { Course } from './Course';

@Entity('offerings')
@Index('idx_offerings_course_qtr', ['courseId', 'year', 'quarter'])
export class Offering {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ name: 'course_id', type: 'integer' })
  courseId!: number;

  @ManyToOne(() => Course, (c: Course) => c.offerings, { nullable: false, onDelete: 'CASCADE' })
  @JoinColumn({ name: 'course_id' })
  course?: Course;

  @Column({ type: 'text' })
  quarter!: string; // ex: Winter

  @Column({ type: 'text', nullable: true })
  year?: string | null;

  @Column({ type: 'text', nullable: true })
  status?: string | null;

  @Column({ type: 'text', nullable: true })
  notes?: string | null; // seat counts, registrar notes

  @Column({ name: 'instructor_name', type: 'text', nullable: true })
  instructorName?: string | null;

  @Column({ name: 'instructor_email', type: 'text', nullable: true })
  instructorEmail?: string | null;

  @Column({ name: 'meeting_pattern', type: 'text', nullable: true })
  meetingPattern?: string | null; // ex: TR 12:30-1:45 HFH 1104
}
