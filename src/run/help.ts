import { Command, Option } from 'commander'

export function buildProgram() {
  return new Command()
    .name('lecture-chapters')
    .description(
      'Find where each scheduled lecture starts in a recorded video (OCR on title frames) and write chapters.'
    )
    .argument('<video>', 'Recorded lecture video')
    .argument('<schedule>', 'Lecture schedule (.xlsx or .csv: type, title, duration)')
    .addOption(
      new Option('-r, --range <range>', 'Lectures to process, e.g. 1-5, 3-, -7 or 4').conflicts(
        'section'
      )
    )
    .addOption(
      new Option('-s, --section <range>', 'Sections to process, e.g. 2-3').conflicts('range')
    )
    .option('-o, --output <csv>', 'Timestamps CSV path (default: timestamps.csv)')
    .option('-w, --window <seconds>', 'Search window width around each estimate (default: 90)')
    .option(
      '--crop <percent...>',
      'OCR area as four percentages: left top right bottom (e.g. --crop 0 0 100 30)'
    )
    .option('-t, --truncate <n>', 'Match only the first n characters of each title')
    .option('--strip-prefix', 'Drop the leading numbering ("12. ") from titles before matching')
    .option('--fps <rate>', 'Frames sampled per second of video (default: 1)')
    .option('--workers <n>', 'Concurrent OCR processes per search, 1-16 (default: 4)')
    .option('--save-frames [dir]', 'Save the matched frame and its OCR input (default dir: .)')
    .option('--chapters-output <path>', 'Chaptered video path (default: <video>_chapters.mp4)')
    .option('--no-chapters', 'Stop after writing the CSV')
    .option('--no-prompt', 'Skip manual timestamps and the confirmation')
    .option('-v, --verbose', 'Debug-level logging', false)
    .option('-V, --version', 'Print version and exit', false)
    .allowExcessArguments(false)
}

export function buildScheduleProgram() {
  return new Command()
    .name('lecture-chapters schedule')
    .description('Print the parsed schedule with estimated start and end times.')
    .argument('<file>', 'Lecture schedule (.xlsx or .csv)')
    .addOption(new Option('-r, --range <range>', 'Lectures to include').conflicts('section'))
    .addOption(new Option('-s, --section <range>', 'Sections to include').conflicts('range'))
    .allowExcessArguments(false)
}

export function buildHelpFooter(): string {
  return `
Examples:
  lecture-chapters course.mp4 schedule.xlsx
  lecture-chapters course.mp4 schedule.xlsx -s 2-3 --crop 0 0 100 35 --strip-prefix
  lecture-chapters course.mp4 schedule.xlsx -r 10- -w 120 --no-prompt
  lecture-chapters schedule schedule.xlsx -s 1

Env Vars:
  FFMPEG_PATH                   optional path to ffmpeg
  FFPROBE_PATH                  optional path to ffprobe
  TESSERACT_PATH                optional path to tesseract
  LECTURE_CHAPTERS_OCR_WORKERS  optional default for --workers
  LECTURE_CHAPTERS_CONFIG       optional config path (default: ~/.lecture-chapters/config.json)
`
}

export function attachHelpFooter(program: Command): Command {
  return program.addHelpText('after', buildHelpFooter())
}
