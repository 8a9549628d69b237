import { rename, rm, writeFile } from 'node:fs/promises'
import type { Registry } from 'prom-client'

/**
 * Write a registry in Prometheus text format. The content goes to a sibling
 * temp file first and is renamed into place, so the collector never reads a
 * partial file.
 */
export async function writeMetricsFile(registry: Registry, path: string): Promise<void> {
  const content = await registry.metrics()
  const tempPath = `${path}.${process.pid}.tmp`
  try {
    await writeFile(tempPath, content, 'utf-8')
    await rename(tempPath, path)
  } catch (err) {
    await rm(tempPath, { force: true })
    throw err
  }
}
