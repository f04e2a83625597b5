import { Entity, PrimaryGeneratedColumn, Column, OneToMany, Index } from 'typeorm';
import { Offering } from './Offering';

@Entity('courses')
@Index('idx_courses_major_code', ['major', 'courseCode'], { unique: true })
export class Course {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  major!: string; // ex: Statistics & Data Science

  @Column({ name: 'course_code', type: 'text' })
  courseCode!: string; // ex: PSTAT 120A

  @Column({ type: 'text' })
  title!: string;

  // text because catalogs list ranges such as "1.0-4.0"
  @Column({ type: 'text', nullable: true })
  units?: string | null;

  @Column({ type: 'text', nullable: true })
  level?: string | null;

  @Column({ type: 'text', nullable: true })
  description?: string | null;

  @Column({ type: 'text', nullable: true })
  prerequisites?: string | null;

  @Column({ name: 'additional_info', type: 'text', nullable: true })
  additionalInfo?: string | null;

  @Column({ name: 'catalog_url', type: 'text', nullable: true })
  catalogUrl?: string | null;

  @OneToMany(() => Offering, (o) => o.course)
  offerings?: Offering[];
}
