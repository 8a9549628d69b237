/**
 * Prometheus Metrics Module
 *
 * Per-run publication metrics, written to a node_exporter textfile.
 * Follows Prometheus naming conventions with the txpublish_ prefix.
 */

export { PublishMetrics } from './publish'
export { writeMetricsFile } from './textfile'
