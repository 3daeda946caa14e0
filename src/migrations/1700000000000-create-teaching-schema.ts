import { MigrationInterface, QueryRunner } from 'typeorm';

export class CreateTeachingSchema1700000000000 implements MigrationInterface {
  name = 'CreateTeachingSchema1700000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "course_layout" (
        "courseCode" varchar(16) NOT NULL,
        "courseName" text NOT NULL,
        CONSTRAINT "PK_course_layout" PRIMARY KEY ("courseCode")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "course_instance" (
        "instanceId" varchar(32) NOT NULL,
        "courseCode" varchar(16) NOT NULL,
        "layoutVersionNo" int NOT NULL,
        "studyYear" int NOT NULL,
        "studyPeriod" varchar(2) NOT NULL,
        "numStudents" int NOT NULL DEFAULT 0,
        CONSTRAINT "PK_course_instance" PRIMARY KEY ("instanceId"),
        CONSTRAINT "UQ_course_instance_offering" UNIQUE ("courseCode", "studyYear", "studyPeriod"),
        CONSTRAINT "CHK_course_instance_students" CHECK ("numStudents" >= 0),
        CONSTRAINT "FK_course_instance_layout" FOREIGN KEY ("courseCode")
          REFERENCES "course_layout" ("courseCode")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_course_instance_courseCode" ON "course_instance" ("courseCode")`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "teaching_activity" (
        "id" SERIAL NOT NULL,
        "activityName" text NOT NULL,
        "factor" numeric(6,2) NOT NULL,
        "isDerived" boolean NOT NULL DEFAULT false,
        CONSTRAINT "PK_teaching_activity" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_teaching_activity_name" UNIQUE ("activityName"),
        CONSTRAINT "CHK_teaching_activity_factor" CHECK ("factor" > 0)
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "planned_activity" (
        "courseInstanceId" varchar(32) NOT NULL,
        "activityId" int NOT NULL,
        "plannedHours" numeric(10,2) NOT NULL,
        CONSTRAINT "PK_planned_activity" PRIMARY KEY ("courseInstanceId", "activityId"),
        CONSTRAINT "CHK_planned_activity_hours" CHECK ("plannedHours" >= 0),
        CONSTRAINT "FK_planned_activity_instance" FOREIGN KEY ("courseInstanceId")
          REFERENCES "course_instance" ("instanceId") ON DELETE CASCADE,
        CONSTRAINT "FK_planned_activity_activity" FOREIGN KEY ("activityId")
          REFERENCES "teaching_activity" ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "employee" (
        "id" SERIAL NOT NULL,
        "firstName" text NOT NULL,
        "lastName" text NOT NULL,
        CONSTRAINT "PK_employee" PRIMARY KEY ("id")
      )
    `);

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "employee_salary_history" (
        "id" SERIAL NOT NULL,
        "employeeId" int NOT NULL,
        "versionNo" int NOT NULL,
        "salaryHour" numeric(10,2) NOT NULL,
        CONSTRAINT "PK_employee_salary_history" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_salary_version" UNIQUE ("employeeId", "versionNo"),
        CONSTRAINT "CHK_salary_hour" CHECK ("salaryHour" > 0),
        CONSTRAINT "FK_salary_employee" FOREIGN KEY ("employeeId")
          REFERENCES "employee" ("id") ON DELETE CASCADE
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_salary_employeeId" ON "employee_salary_history" ("employeeId")`,
    );

    // an allocation always points at a planned association and a pinned salary version
    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "teaching_allocation" (
        "id" SERIAL NOT NULL,
        "employeeId" int NOT NULL,
        "courseInstanceId" varchar(32) NOT NULL,
        "activityId" int NOT NULL,
        "salaryVersionId" int NOT NULL,
        "allocatedHours" numeric(10,2) NOT NULL,
        "isTerminated" boolean NOT NULL DEFAULT false,
        CONSTRAINT "PK_teaching_allocation" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_teaching_allocation_triple" UNIQUE ("employeeId", "courseInstanceId", "activityId"),
        CONSTRAINT "CHK_teaching_allocation_hours" CHECK ("allocatedHours" >= 0),
        CONSTRAINT "FK_allocation_employee" FOREIGN KEY ("employeeId")
          REFERENCES "employee" ("id"),
        CONSTRAINT "FK_allocation_planned" FOREIGN KEY ("courseInstanceId", "activityId")
          REFERENCES "planned_activity" ("courseInstanceId", "activityId"),
        CONSTRAINT "FK_allocation_salary" FOREIGN KEY ("salaryVersionId")
          REFERENCES "employee_salary_history" ("id")
      )
    `);
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_allocation_employeeId" ON "teaching_allocation" ("employeeId")`,
    );
    await queryRunner.query(
      `CREATE INDEX IF NOT EXISTS "idx_allocation_courseInstanceId" ON "teaching_allocation" ("courseInstanceId")`,
    );

    await queryRunner.query(`
      CREATE TABLE IF NOT EXISTS "allocation_rule" (
        "id" smallint NOT NULL,
        "maxInstancesPerPeriod" int NOT NULL,
        CONSTRAINT "PK_allocation_rule" PRIMARY KEY ("id"),
        CONSTRAINT "CHK_allocation_rule_single" CHECK ("id" = 1),
        CONSTRAINT "CHK_allocation_rule_max" CHECK ("maxInstancesPerPeriod" >= 1)
      )
    `);
    await queryRunner.query(
      `INSERT INTO "allocation_rule" ("id", "maxInstancesPerPeriod") VALUES (1, 4) ON CONFLICT ("id") DO NOTHING`,
    );
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "allocation_rule"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "teaching_allocation"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "employee_salary_history"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "employee"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "planned_activity"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "teaching_activity"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "course_instance"`);
    await queryRunner.query(`DROP TABLE IF EXISTS "course_layout"`);
  }
}
