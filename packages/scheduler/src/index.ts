/**
 * @sqlcron/scheduler
 *
 * Cron-scheduled SQL jobs read from plain files
 */

export * from './modules/scheduler/index'
