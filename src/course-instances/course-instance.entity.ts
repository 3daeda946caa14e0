import { Entity, PrimaryColumn, Column, Index, Check, Unique } from 'typeorm';

/**
 * One offering of a course in a (studyYear, studyPeriod).
 * `numStudents` only grows, through the increase operation.
 */
@Entity({ name: 'course_instance' })
@Unique('UQ_course_instance_offering', ['courseCode', 'studyYear', 'studyPeriod'])
@Check('CHK_course_instance_students', '"numStudents" >= 0')
export class CourseInstanceEntity {
  @PrimaryColumn({ type: 'varchar', length: 32 })
  instanceId!: string;

  @Index()
  @Column({ type: 'varchar', length: 16 })
  courseCode!: string;

  @Column({ type: 'int' })
  layoutVersionNo!: number;

  @Column({ type: 'int' })
  studyYear!: number;

  @Column({ type: 'varchar', length: 2 })
  studyPeriod!: string; // 'P1'..'P4'

  @Column({ type: 'int', default: 0 })
  numStudents!: number;
}
