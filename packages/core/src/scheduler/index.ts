export { TimerTicker, ManualTicker, settle, type Ticker } from './Ticker.js'
export {
  MaintenanceTask,
  type MaintenanceTaskOptions,
  type TaskResult,
  type TaskRunRecord,
  type TaskStatus,
} from './MaintenanceTask.js'
export { TaskScheduler, MAX_HISTORY, type TaskSchedulerOptions } from './TaskScheduler.js'
export {
  MaintenanceScheduler,
  type MaintenanceSchedulerOptions,
  type MaintenanceReport,
  type MaintenanceStatus,
} from './MaintenanceScheduler.js'
export {
  AnalyticsScheduler,
  ratePerformance,
  type AnalyticsSchedulerOptions,
  type AnalyticsSchedulerStatus,
  type CleanupResult,
  type DailyReport,
  type PerformanceRating,
} from './AnalyticsScheduler.js'
export {
  vacuumDatabase,
  analyzeDatabase,
  optimizeIndexes,
  healthCheck,
  integrityCheck,
  type HealthReport,
} from './maintenanceTasks.js'
export { MetadataHistoryStore, type HistoryStore } from './historyStore.js'
