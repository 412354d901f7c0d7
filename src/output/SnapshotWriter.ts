/**
 * Destination for rendered snapshot files
 */
export interface SnapshotWriter {
  /**
   * Write one rendered snapshot and return where it went
   */
  write(fileName: string, contents: string): Promise<string>
}

const pad = (value: number): string => String(value).padStart(2, '0')

/**
 * snapshot-yyyyMMdd-HHmmss.<extension>, in local time
 */
export function snapshotFileName(date: Date, extension: string): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  return `snapshot-${day}-${time}.${extension}`
}
