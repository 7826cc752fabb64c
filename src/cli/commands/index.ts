export { reportCommand, formatTextReport, formatTrend, buildReportResult, type ReportResult } from './report.js'
export { dashboardCommand } from './dashboard.js'
