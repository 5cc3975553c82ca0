/**
 * Export Command
 *
 * Write the flattened chronological transcript handed to the analysis service.
 */

import { writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import { exportToText } from '../../export/index'
import type { CLIArgs } from '../args'
import { ensureDir } from '../io'
import type { Logger } from '../logger'
import { initContext, stepParse } from '../steps/index'

export async function cmdExport(args: CLIArgs, logger: Logger): Promise<void> {
  const ctx = await initContext(args, logger)
  const transcript = stepParse(ctx)

  const text = exportToText(transcript, { includeSystem: ctx.settings.includeSystem })

  if (!args.output) {
    console.log(text)
    return
  }

  await ensureDir(dirname(args.output))
  await writeFile(args.output, `${text}\n`)
  logger.success(`Saved ${transcript.messages.length.toLocaleString()} messages to ${args.output}`)
}
