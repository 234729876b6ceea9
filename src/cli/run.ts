import { LangAnalyzer } from '../analyzer/LangAnalyzer'
import { ConfigLoader } from '../config/ConfigLoader'
import { FileStorage } from '../storage/FileStorage'
import { Storage } from '../storage/Storage'
import { AnalysisOutcome } from '../contracts'
import { debugLog } from '../logging/debugLog'

export interface RunOptions {
  configLoader?: ConfigLoader
  storage?: Storage
  clock?: () => Date
}

export class MissingSourceError extends Error {
  constructor() {
    super('No source file given. Pass a path or set "source.path" in langdiff.config.json.')
    this.name = 'MissingSourceError'
  }
}

export async function run(
  sourcePath?: string,
  options: RunOptions = {}
): Promise<AnalysisOutcome> {
  const configLoader = options.configLoader ?? new ConfigLoader()
  const config = configLoader.getConfig()
  const effectivePath = sourcePath ?? config.source.path

  if (!effectivePath) {
    throw new MissingSourceError()
  }

  debugLog({ event: 'run_start', sourcePath: effectivePath, output: config.output })

  const analyzer = new LangAnalyzer(options.storage ?? new FileStorage(), config, options.clock)
  const outcome = await analyzer.analyzeFile(effectivePath)
  console.log(analyzer.summarize(outcome))
  return outcome
}
