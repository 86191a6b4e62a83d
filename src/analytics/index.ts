/**
 * Analytics Exports
 *
 * @module analytics
 */

export { JsonlAnalyticsSink, analyticsPath, type AnalyticsSink } from './sink.js';
