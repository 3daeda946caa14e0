import { Entity, PrimaryGeneratedColumn, Column } from 'typeorm';

/**
 * Also the anchor row locked by allocation: holding `FOR UPDATE` on it
 * serialises every allocation attempt for this employee.
 */
@Entity({ name: 'employee' })
export class EmployeeEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  firstName!: string;

  @Column({ type: 'text' })
  lastName!: string;
}
