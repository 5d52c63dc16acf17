// Single-line progress bar on stderr. Redrawn in place on a terminal; on a
// pipe only every tenth percent is printed.

const BAR_WIDTH = 30

export interface ProgressBar {
  update(done: number, total: number): void
  finish(): void
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return bytes + ' B'
  if (bytes < 1024 * 1024) return (bytes / 1024).toFixed(1) + ' KB'
  return (bytes / (1024 * 1024)).toFixed(1) + ' MB'
}

export function renderProgress(label: string, done: number, total: number): string {
  const fraction = total > 0 ? Math.min(done / total, 1) : 1
  const filled = Math.round(fraction * BAR_WIDTH)
  const bar = '#'.repeat(filled) + '-'.repeat(BAR_WIDTH - filled)
  const percent = Math.floor(fraction * 100)
  return `${label} [${bar}] ${percent}% (${formatSize(done)} / ${formatSize(total)})`
}

export interface ProgressStream {
  isTTY?: boolean
  write(text: string): boolean
}

export function createProgressBar(label: string, stream: ProgressStream = process.stderr): ProgressBar {
  const interactive = stream.isTTY === true
  let lastDecile = -1
  let drawn = false

  return {
    update(done, total) {
      const line = renderProgress(label, done, total)
      if (interactive) {
        stream.write('\r' + line)
        drawn = true
        return
      }
      const decile = total > 0 ? Math.floor(done * 10 / total) : 10
      if (decile !== lastDecile) {
        lastDecile = decile
        stream.write(line + '\n')
      }
    },
    finish() {
      if (interactive && drawn) stream.write('\n')
      drawn = false
    }
  }
}
