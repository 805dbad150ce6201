export { TextReportFormatter, type TextReportFormatterConfig } from "./TextReportFormatter";
export { JsonReportFormatter } from "./JsonReportFormatter";
