import { execFile } from 'child_process';
import { platform } from 'os';
import { z } from 'zod';
import { UnsupportedPlatformError } from './errors.js';

export interface RecycleBinInfo {
  bytes: number;
  items: number;
  /** Some deleted folder could not be measured in full, so `bytes` is a lower bound. */
  partial?: boolean;
}

export interface RecycleBin {
  query(): Promise<RecycleBinInfo>;
  empty(): Promise<void>;
}

// Shell namespace 10 is the Recycle Bin across all drives.
// FolderItem.Size is 0 for a deleted folder, so folders are measured by walking their $R entry.
const QUERY_SCRIPT = [
  '$items = @((New-Object -ComObject Shell.Application).NameSpace(10).Items())',
  '$bytes = [int64]0',
  '$partial = $false',
  'foreach ($item in $items) {' +
    ' if ($item.IsFolder) {' +
    ' $walkErrors = $null;' +
    ' $sum = (Get-ChildItem -LiteralPath $item.Path -Recurse -File -Force -ErrorAction SilentlyContinue -ErrorVariable walkErrors | Measure-Object -Property Length -Sum).Sum;' +
    ' if ($walkErrors) { $partial = $true };' +
    ' $bytes += [int64]$sum' +
    ' } else { $bytes += [int64]$item.Size }' +
    ' }',
  '@{ items = [int64]$items.Count; bytes = $bytes; partial = $partial } | ConvertTo-Json -Compress',
].join('; ');

const EMPTY_SCRIPT = 'Clear-RecycleBin -Force -ErrorAction Stop';

const queryOutputSchema = z.object({
  items: z.number().int().nonnegative(),
  bytes: z.number().nonnegative(),
  partial: z.boolean().default(false),
});

const POWERSHELL_TIMEOUT_MS = 120_000;

function runPowerShell(script: string): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(
      'powershell.exe',
      ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-Command', script],
      { windowsHide: true, timeout: POWERSHELL_TIMEOUT_MS },
      (error, stdout, stderr) => {
        if (error) {
          const detail = String(stderr).trim();
          reject(detail ? new Error(`${error.message.trim()}: ${detail}`) : error);
          return;
        }
        resolve(String(stdout));
      }
    );
  });
}

export class WindowsRecycleBin implements RecycleBin {
  private ensureWindows(): void {
    const current = platform();
    if (current !== 'win32') {
      throw new UnsupportedPlatformError('The Recycle Bin', current);
    }
  }

  async query(): Promise<RecycleBinInfo> {
    this.ensureWindows();
    const output = await runPowerShell(QUERY_SCRIPT);
    let parsed: unknown;
    try {
      parsed = JSON.parse(output.trim());
    } catch {
      throw new Error(`Unexpected Recycle Bin query output: ${output.trim().slice(0, 200)}`);
    }
    return queryOutputSchema.parse(parsed);
  }

  async empty(): Promise<void> {
    this.ensureWindows();
    await runPowerShell(EMPTY_SCRIPT);
  }
}
