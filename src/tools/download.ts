import {mkdirSync, renameSync, rmSync} from 'node:fs'
import {join} from 'node:path'
import {ToolMissingError} from '../errors.js'
import type {Step} from '../types.js'
import type {ToolLocator} from './locate.js'

export type DownloadOptions = {
  /** Directory name of the checkout inside the cache (e.g. "tree-sitter-lua"). */
  projectName: string;
  url: string;
  revision?: string;
  branch?: string;
  cacheDir: string;
  preferGit?: boolean;
  locate: ToolLocator;
}

const downloadError = 'Error during download, please verify your internet connection'

/**
 * Produces the steps that leave the source of `url` at
 * `<cacheDir>/<projectName>`.
 *
 * GitHub and GitLab archives are fetched with curl and unpacked with tar when
 * both are available; everything else (or `preferGit`) goes through git.
 *
 * The ref is the revision, else the branch, else `master`. Catalog entries
 * that are not pinned should name their branch.
 */
export function selectDownloadSteps(options: DownloadOptions): Step[] {
  const {projectName, url, cacheDir, preferGit, locate} = options
  const revision = options.revision ?? options.branch ?? 'master'
  const isGithub = url.includes('github.com')
  const isGitlab = url.includes('gitlab.com')
  const canUseTar = locate('tar') !== undefined && locate('curl') !== undefined

  if (canUseTar && (isGithub || isGitlab) && !preferGit) {
    return tarballSteps({projectName, url, revision, cacheDir, isGithub})
  }

  if (!locate('git')) {
    throw new ToolMissingError('git', 'Git is required on your system to download parsers')
  }

  return [
    {
      kind: 'shell',
      command: 'git',
      args: ['clone', url, projectName, '--filter=blob:none'],
      cwd: cacheDir,
      info: `Downloading ${projectName}...`,
      error: downloadError
    },
    {
      kind: 'shell',
      command: 'git',
      args: ['checkout', revision],
      cwd: join(cacheDir, projectName),
      info: 'Checking out locked revision',
      error: 'Error while checking out revision'
    }
  ]
}

function tarballSteps({projectName, url, revision, cacheDir, isGithub}: {
  projectName: string;
  url: string;
  revision: string;
  cacheDir: string;
  isGithub: boolean;
}): Step[] {
  const baseUrl = url.replace(/\.git$/, '')
  const repoName = baseUrl.slice(baseUrl.lastIndexOf('/') + 1)
  // GitHub strips the leading "v" of tags in the archive's top-level folder
  const folderRevision = isGithub && /^v\d/.test(revision) ? revision.slice(1) : revision
  const archive = `${projectName}.tar.gz`
  const tmpDir = join(cacheDir, `${projectName}-tmp`)
  const archiveUrl = isGithub
    ? `${baseUrl}/archive/${revision}.tar.gz`
    : `${baseUrl}/-/archive/${revision}/${projectName}-${revision}.tar.gz`

  return [
    {
      kind: 'shell',
      command: 'curl',
      args: ['--silent', '--show-error', '-L', archiveUrl, '--output', archive],
      cwd: cacheDir,
      info: `Downloading ${projectName}...`,
      error: downloadError
    },
    {
      kind: 'action',
      action() {
        rmSync(tmpDir, {recursive: true, force: true})
      }
    },
    {
      kind: 'action',
      action() {
        mkdirSync(tmpDir, {recursive: true})
      }
    },
    {
      kind: 'shell',
      command: 'tar',
      args: ['-xvzf', archive, '-C', `${projectName}-tmp`],
      cwd: cacheDir,
      info: `Extracting ${projectName}...`,
      error: 'Error during tarball extraction.'
    },
    {
      kind: 'action',
      action() {
        rmSync(join(cacheDir, archive), {force: true})
      }
    },
    {
      kind: 'action',
      action() {
        renameSync(join(tmpDir, `${repoName}-${folderRevision}`), join(cacheDir, projectName))
      }
    },
    {
      kind: 'action',
      action() {
        rmSync(tmpDir, {recursive: true, force: true})
      }
    }
  ]
}
