import type { Command } from 'commander'
import { CommanderError } from 'commander'

import { calculateEstimatedTimes, parseScheduleRows, selectLectures } from '../schedule/parser.js'
import { formatScheduleSummary } from '../schedule/summary.js'
import type { ScheduleRow } from '../schedule/types.js'
import { attachHelpFooter, buildProgram, buildScheduleProgram } from './help.js'
import { readCliOptions, resolveSelection } from './run-settings.js'

type OutputContext = {
  normalizedArgv: string[]
  stdout: NodeJS.WritableStream
  stderr: NodeJS.WritableStream
}

function routeOutput(program: Command, { stdout, stderr }: Omit<OutputContext, 'normalizedArgv'>) {
  program.configureOutput({
    writeOut(str) {
      stdout.write(str)
    },
    writeErr(str) {
      stderr.write(str)
    },
  })
  return program
}

/** `lecture-chapters help [schedule]` */
export function handleHelpRequest({ normalizedArgv, stdout, stderr }: OutputContext): boolean {
  if (normalizedArgv[0]?.toLowerCase() !== 'help') return false
  const topic = normalizedArgv[1]?.toLowerCase()
  if (topic === 'schedule') {
    routeOutput(buildScheduleProgram(), { stdout, stderr }).outputHelp()
    return true
  }
  routeOutput(attachHelpFooter(buildProgram()), { stdout, stderr }).outputHelp()
  return true
}

/** `lecture-chapters schedule <file> [-r range | -s range]` prints the parsed schedule. */
export async function handleScheduleRequest({
  normalizedArgv,
  stdout,
  stderr,
  loadSchedule,
}: OutputContext & {
  loadSchedule: (filePath: string) => Promise<ScheduleRow[]>
}): Promise<boolean> {
  if (normalizedArgv[0] !== 'schedule') return false
  const program = routeOutput(buildScheduleProgram(), { stdout, stderr })
  program.exitOverride()
  try {
    program.parse(normalizedArgv.slice(1), { from: 'user' })
  } catch (error) {
    if (error instanceof CommanderError && error.code === 'commander.helpDisplayed') {
      return true
    }
    throw error
  }

  const [file] = program.args
  if (!file) return true
  const selection = resolveSelection(readCliOptions(program.opts()))
  const lectures = calculateEstimatedTimes(
    selectLectures(parseScheduleRows(await loadSchedule(file)), selection)
  )
  stdout.write(`${formatScheduleSummary(lectures)}\n`)
  return true
}
