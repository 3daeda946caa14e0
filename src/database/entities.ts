import { CourseLayoutEntity } from '../course-instances/course-layout.entity';
import { CourseInstanceEntity } from '../course-instances/course-instance.entity';
import { TeachingActivityEntity } from '../activities/teaching-activity.entity';
import { PlannedActivityEntity } from '../activities/planned-activity.entity';
import { EmployeeEntity } from '../employees/employee.entity';
import { SalaryVersionEntity } from '../employees/salary-version.entity';
import { TeachingAllocationEntity } from '../allocations/teaching-allocation.entity';
import { AllocationRuleEntity } from '../allocations/allocation-rule.entity';

export const TEACHING_ENTITIES = [
  CourseLayoutEntity,
  CourseInstanceEntity,
  TeachingActivityEntity,
  PlannedActivityEntity,
  EmployeeEntity,
  SalaryVersionEntity,
  TeachingAllocationEntity,
  AllocationRuleEntity,
];
