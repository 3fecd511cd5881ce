import { log, setLogLevel } from '@shared/logger'
import { openStore } from './node/adapters/store'
import { parseCommand } from './node/core/command'
import { loadConfiguration } from './node/core/config'
import { buildHistoryDocument, buildReportDocument, renderDocument } from './node/report'
import { listCommits } from './node/services/HistoryService'
import { buildReport } from './node/services/ReportService'

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  try {
    const command = parseCommand(argv)
    const config = loadConfiguration(
      process.env,
      command.repoPath ? { repoPath: command.repoPath } : {}
    )
    setLogLevel(config.logLevel)
    log.debug(`[main] Running ${command.kind} for: ${config.repoPath}`)

    const store = await openStore(config.repoPath)
    const document =
      command.kind === 'list'
        ? buildHistoryDocument(await listCommits(store, { limit: command.limit }), {
            short: command.short
          })
        : buildReportDocument(
            await buildReport(store, { status: { renameThreshold: config.renameThreshold } })
          )
    process.stdout.write(`${renderDocument(document, { color: config.color })}\n`)
  } catch (error) {
    log.error('Error reading repository:', error)
    process.exitCode = 1
  }
}

void main()
