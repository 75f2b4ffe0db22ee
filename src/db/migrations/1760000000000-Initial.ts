import { MigrationInterface, QueryRunner } from 'typeorm'
import { TASK_STATUS_CHECK } from '../entities/Task.js'

export class Initial1760000000000 implements MigrationInterface {
  name = 'Initial1760000000000'

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`CREATE TABLE IF NOT EXISTS committees (
      name text PRIMARY KEY NOT NULL,
      full_name text,
      committee_members text NOT NULL DEFAULT '[]',
      committers text NOT NULL DEFAULT '[]',
      parent_committee_name text REFERENCES committees(name) ON DELETE RESTRICT,
      CHECK (parent_committee_name IS NULL OR parent_committee_name <> name)
    )`)
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_committees_parent ON committees(parent_committee_name)`)

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS release_policies (
      id integer PRIMARY KEY AUTOINCREMENT NOT NULL,
      mailto_addresses text,
      manual_vote boolean,
      min_hours integer CHECK (min_hours IS NULL OR min_hours >= 0),
      release_checklist text,
      start_vote_template text,
      announce_release_template text,
      binary_artifact_paths text,
      source_artifact_paths text,
      github_repository_name text,
      github_compose_workflow_path text,
      github_vote_workflow_path text,
      github_finish_workflow_path text,
      strict_checking boolean,
      pause_for_rm boolean
    )`)

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS projects (
      name text PRIMARY KEY NOT NULL,
      full_name text,
      description text,
      category text,
      programming_languages text NOT NULL DEFAULT '[]',
      committee_name text NOT NULL REFERENCES committees(name) ON DELETE RESTRICT,
      release_policy_id integer UNIQUE REFERENCES release_policies(id) ON DELETE SET NULL
    )`)
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_projects_committee ON projects(committee_name)`)

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS releases (
      name text PRIMARY KEY NOT NULL,
      version text NOT NULL,
      phase text NOT NULL CHECK (phase IN ('RELEASE_CANDIDATE_DRAFT', 'RELEASE_CANDIDATE', 'RELEASE_PREVIEW', 'RELEASE')),
      project_name text NOT NULL REFERENCES projects(name) ON DELETE RESTRICT,
      created text NOT NULL,
      released text,
      podling_thread_id text,
      UNIQUE (project_name, version)
    )`)

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS revisions (
      release_name text NOT NULL REFERENCES releases(name) ON DELETE CASCADE,
      seq integer NOT NULL CHECK (seq >= 1),
      number integer NOT NULL CHECK (number >= 1),
      name text NOT NULL UNIQUE,
      author text NOT NULL,
      description text,
      parent_name text,
      created text NOT NULL,
      PRIMARY KEY (release_name, seq),
      UNIQUE (release_name, number)
    )`)

    await queryRunner.query(`CREATE TABLE IF NOT EXISTS tasks (
      id integer PRIMARY KEY AUTOINCREMENT NOT NULL,
      task_type text NOT NULL,
      status text NOT NULL CHECK (status IN ('QUEUED', 'ACTIVE', 'COMPLETED', 'FAILED')),
      task_args text NOT NULL DEFAULT '{}',
      added text NOT NULL,
      started text,
      pid integer,
      completed text,
      result text,
      error text,
      requester text,
      project_name text,
      version_name text,
      revision_number integer,
      CONSTRAINT tasks_status_consistency CHECK ${TASK_STATUS_CHECK}
    )`)
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_tasks_status ON tasks(status)`)
    await queryRunner.query(`CREATE INDEX IF NOT EXISTS idx_tasks_scope ON tasks(project_name, version_name, revision_number)`)
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS tasks`)
    await queryRunner.query(`DROP TABLE IF EXISTS revisions`)
    await queryRunner.query(`DROP TABLE IF EXISTS releases`)
    await queryRunner.query(`DROP TABLE IF EXISTS projects`)
    await queryRunner.query(`DROP TABLE IF EXISTS release_policies`)
    await queryRunner.query(`DROP TABLE IF EXISTS committees`)
  }
}
