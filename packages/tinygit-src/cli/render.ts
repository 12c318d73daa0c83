import type { Author, ReadCommitResult } from '../models/GitCommit.ts'
import type { BranchInfo } from '../commands/listBranches.ts'
import type { StatusResult } from '../commands/status.ts'

export const shortOid = (oid: string): string => oid.slice(0, 7)

const INDENT = '        '

/**
 * `2024-01-02T03:04:05+01:00`, in the author's own timezone.
 */
export const formatDate = ({ timestamp, timezoneOffset }: Author): string => {
  const local = new Date((timestamp - timezoneOffset * 60) * 1000).toISOString().slice(0, 19)
  const minutes = Math.abs(timezoneOffset)
  const sign = timezoneOffset > 0 ? '-' : '+'
  const hh = String(Math.floor(minutes / 60)).padStart(2, '0')
  const mm = String(minutes % 60).padStart(2, '0')
  return `${local}${sign}${hh}:${mm}`
}

export const renderStatus = (
  status: StatusResult,
  { committed, missing }: { committed: Set<string>; missing: Set<string> }
): string => {
  const lines: string[] = []
  if (status.detached && status.head !== null) {
    lines.push(`HEAD detached at ${shortOid(status.head)}`)
  } else {
    lines.push(`On branch ${status.branch ?? ''}`)
  }
  if (status.head === null) {
    lines.push('', 'No commits yet')
  }
  if (status.staged.length > 0) {
    lines.push('', 'Changes to be committed:', '  (use "tinygit reset <file>..." to unstage)', '')
    for (const file of status.staged) {
      lines.push(`${INDENT}${committed.has(file) ? 'modified:   ' : 'new file:   '}${file}`)
    }
  }
  if (status.modified.length > 0) {
    lines.push(
      '',
      'Changes not staged for commit:',
      '  (use "tinygit add <file>..." to update what will be committed)',
      ''
    )
    for (const file of status.modified) {
      lines.push(`${INDENT}${missing.has(file) ? 'deleted:    ' : 'modified:   '}${file}`)
    }
  }
  if (status.untracked.length > 0) {
    lines.push(
      '',
      'Untracked files:',
      '  (use "tinygit add <file>..." to include in what will be committed)',
      ''
    )
    for (const file of status.untracked) {
      lines.push(`${INDENT}${file}`)
    }
  }
  if (status.staged.length === 0) {
    if (status.modified.length > 0) {
      lines.push('', 'no changes added to commit (use "tinygit add")')
    } else if (status.untracked.length > 0) {
      lines.push('', 'nothing added to commit but untracked files present (use "tinygit add" to track)')
    } else {
      lines.push('', 'nothing to commit, working tree clean')
    }
  }
  return lines.join('\n')
}

export const renderCommitSummary = ({
  branch,
  oid,
  message,
  filesChanged,
}: {
  branch: string | null
  oid: string
  message: string
  filesChanged: number
}): string => {
  const subject = message.trim().split('\n')[0]
  const where = branch ?? 'detached HEAD'
  const noun = filesChanged === 1 ? 'file' : 'files'
  return `[${where} ${shortOid(oid)}] ${subject}\n ${filesChanged} ${noun} changed`
}

export const renderLog = (commits: ReadCommitResult[]): string => {
  if (commits.length === 0) return 'No commits yet'
  return commits
    .map(({ oid, commit }) => {
      const body = commit.message
        .replace(/\n+$/, '')
        .split('\n')
        .map(line => (line === '' ? '' : `    ${line}`))
        .join('\n')
      return [
        `commit ${oid}`,
        `Author: ${commit.author.name} <${commit.author.email}>`,
        `Date:   ${formatDate(commit.author)}`,
        '',
        body,
      ].join('\n')
    })
    .join('\n\n')
}

export const renderBranches = (branches: BranchInfo[]): string => {
  return branches.map(({ name, current }) => `${current ? '* ' : '  '}${name}`).join('\n')
}
