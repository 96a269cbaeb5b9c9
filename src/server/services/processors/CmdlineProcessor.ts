/**
 * mod_cmdline - runs an external command on each persisted document file
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { z } from 'zod';
import type { NewsDocument } from '../../models/Document.js';
import type { StageContext } from '../../pipeline/types.js';
import { errorMessage } from '../../types/errors.js';
import { BaseProcessor } from './BaseProcessor.js';

const execFileAsync = promisify(execFile);

export const cmdlineOptionsSchema = z
  .object({
    command_name: z.string().min(1),
    /** Seconds before the command is killed */
    timeout: z.number().positive().default(300),
  })
  .passthrough();

export class CmdlineProcessor extends BaseProcessor<typeof cmdlineOptionsSchema> {
  constructor(ctx: StageContext) {
    super(ctx, cmdlineOptionsSchema);
  }

  protected async processDocument(doc: NewsDocument): Promise<void> {
    if (!doc.filename) {
      this.logger.warn({ url: doc.url }, 'Document has no file name, command not run');
      return;
    }

    try {
      const { stdout, stderr } = await execFileAsync(this.options.command_name, [doc.filename], {
        timeout: this.options.timeout * 1000,
      });
      this.logger.info({ url: doc.url, stdout: stdout.trim() }, 'Command completed');
      if (stderr.trim().length > 0) {
        this.logger.warn({ url: doc.url, stderr: stderr.trim() }, 'Command wrote to stderr');
      }
    } catch (error) {
      this.logger.error(
        { url: doc.url, command: this.options.command_name, error: errorMessage(error) },
        'Command failed'
      );
    }
  }
}
