import { MigrationInterface, QueryRunner } from 'typeorm'

export class Distributions1760000001000 implements MigrationInterface {
  name = 'Distributions1760000001000'

  public async up(q: QueryRunner): Promise<void> {
    await q.query(`CREATE TABLE IF NOT EXISTS distributions (
      id integer PRIMARY KEY AUTOINCREMENT NOT NULL,
      release_name text NOT NULL REFERENCES releases(name) ON DELETE CASCADE,
      platform text NOT NULL,
      owner_namespace text NOT NULL DEFAULT '',
      package text NOT NULL,
      version text NOT NULL,
      staging boolean NOT NULL DEFAULT 0,
      upload_date text NOT NULL,
      api_url text NOT NULL,
      web_url text,
      UNIQUE (release_name, platform, owner_namespace, package, version)
    )`)
    await q.query(`CREATE INDEX IF NOT EXISTS idx_distributions_release ON distributions(release_name)`)
  }

  public async down(q: QueryRunner): Promise<void> {
    await q.query('DROP TABLE IF EXISTS distributions')
  }
}
