import { TeachingAllocation } from './allocation-state';
import { AllocationView } from '../database/teaching-store';

export function presentAllocation(a: TeachingAllocation) {
  return {
    employeeId: a.key.employeeId,
    instanceId: a.key.instanceId,
    activityId: a.key.activityId,
    status: a.state.status,
    salaryVersionId: a.state.salaryVersionId,
    hours: a.state.hours.toFixed(2),
  };
}

export function presentAllocationView(v: AllocationView) {
  return {
    employeeId: v.employeeId,
    teacherName: v.teacherName,
    instanceId: v.instanceId,
    courseCode: v.courseCode,
    courseName: v.courseName,
    studyYear: v.studyYear,
    studyPeriod: v.studyPeriod,
    activityId: v.activityId,
    activityName: v.activityName,
    allocatedHours: v.allocatedHours.toFixed(2),
    salaryVersionId: v.salaryVersionId,
    salaryHour: v.salaryHour.toFixed(2),
  };
}
