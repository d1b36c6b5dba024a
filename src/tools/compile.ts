import process from 'node:process'
import {basename, extname} from 'node:path'
import type {InstallInfo, ShellStep} from '../types.js'

const cppExtensions = new Set(['.cc', '.cpp', '.cxx'])

/** Default compilers, tried in order after `CC`. */
export const defaultCompilers = ['cc', 'gcc', 'clang', 'cl', 'zig']

function compilerName(compiler: string): string {
  return basename(compiler).replace(/\.exe$/i, '')
}

function ccArgs(files: string[], platform: NodeJS.Platform): string[] {
  const args = ['-o', 'parser.so', '-I./src', ...files, '-Os']
  args.push(platform === 'darwin' ? '-bundle' : '-shared')

  if (files.some(file => cppExtensions.has(extname(file)))) {
    args.push('-lstdc++')
  }

  if (platform !== 'win32') {
    args.push('-fPIC')
  }

  return args
}

/**
 * Builds the compile invocation producing `parser.so` in `cwd`.
 */
export function selectCompileStep(
  info: Pick<InstallInfo, 'files'>,
  compiler: string,
  cwd: string,
  platform: NodeJS.Platform = process.platform
): ShellStep {
  const name = compilerName(compiler)
  let args: string[]
  if (name === 'cl') {
    args = ['/Fe:', 'parser.so', '/Isrc/', ...info.files, '-Os', '/LD']
  } else if (name === 'zig') {
    args = ['cc', ...ccArgs(info.files, platform)]
  } else {
    args = ccArgs(info.files, platform)
  }

  return {
    kind: 'shell',
    command: compiler,
    args,
    cwd,
    info: 'Compiling...',
    error: 'Error during compilation'
  }
}
