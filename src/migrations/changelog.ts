/**
 * Liquibase "formatted SQL" changelog export.
 *
 * @see https://docs.liquibase.com/concepts/changelogs/sql-format.html
 */

import type { SchemaStatement } from './ddl'

export interface ChangelogOptions {
  author: string
}

const AUTHOR_PATTERN = /^[A-Za-z0-9._-]+$/

export function changesetId(statement: SchemaStatement, position: number): string {
  return `${position}-${statement.kind}-${statement.name}`
}

/**
 * One changeset per statement, numbered from 1, each with its rollback.
 */
export function renderChangelog(statements: SchemaStatement[], options: ChangelogOptions): string {
  if (!AUTHOR_PATTERN.test(options.author)) {
    throw new Error(`Invalid changelog author "${options.author}": use letters, digits, ".", "_" or "-"`)
  }

  const changesets = statements.map((statement, i) =>
    [
      `--changeset ${options.author}:${changesetId(statement, i + 1)}`,
      `${statement.sql};`,
      `--rollback ${statement.rollback};`,
    ].join('\n')
  )

  return `${['--liquibase formatted sql', ...changesets].join('\n\n')}\n`
}
