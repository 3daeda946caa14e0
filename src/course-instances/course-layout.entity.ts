import { Entity, PrimaryColumn, Column } from 'typeorm';

@Entity({ name: 'course_layout' })
export class CourseLayoutEntity {
  @PrimaryColumn({ type: 'varchar', length: 16 })
  courseCode!: string;

  @Column({ type: 'text' })
  courseName!: string;
}
