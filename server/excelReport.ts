import ExcelJS from "exceljs";
import type { ForecastContext, ForecastEvent } from "@shared/schema";
import type {
  AttributionReport,
  CalibrationConstants,
  PeriodAggregate,
  ProjectionRow,
  ShockSignature,
  SimilarityWeights,
} from "@shared/forecastTypes";
import { describeEvent } from "./engine/attribution";

export interface ExcelReportContext {
  generatedAt: string;
  context: ForecastContext;
  entities: string[];
  weights: SimilarityWeights;
  constants: CalibrationConstants | null;
  rows: ProjectionRow[];
  periods: PeriodAggregate[];
  events: ForecastEvent[];
  attribution: AttributionReport | null;
  signatures: ShockSignature[];
}

const HEADER_FILL: ExcelJS.Fill = {
  type: "pattern",
  pattern: "solid",
  fgColor: { argb: "FFF1F5F9" },
};

const HEADER_BORDER: Partial<ExcelJS.Borders> = {
  top: { style: "thin", color: { argb: "FFD0D7DE" } },
  left: { style: "thin", color: { argb: "FFD0D7DE" } },
  bottom: { style: "thin", color: { argb: "FFD0D7DE" } },
  right: { style: "thin", color: { argb: "FFD0D7DE" } },
};

const INTEGER_FORMAT = "#,##0";
const CURRENCY_FORMAT = "#,##0.00";
const PERCENT_FORMAT = "0.00%";

const DATE_TIME_FORMATTER = new Intl.DateTimeFormat("en-GB", {
  dateStyle: "medium",
  timeStyle: "short",
  timeZone: "UTC",
});

function formatDateTime(iso?: string | null): string {
  if (!iso) {
    return "N/A";
  }
  const date = new Date(iso);
  if (Number.isNaN(date.getTime())) {
    return iso;
  }
  return DATE_TIME_FORMATTER.format(date);
}

const MUTED_FONT: Partial<ExcelJS.Font> = { italic: true, color: { argb: "FF6B7280" } };

function styleHeaderCell(cell: ExcelJS.Cell): void {
  cell.font = { bold: true };
  cell.alignment = { vertical: "middle" };
  cell.fill = HEADER_FILL;
  cell.border = HEADER_BORDER;
}

function addHeaderRow(sheet: ExcelJS.Worksheet, headers: string[]): ExcelJS.Row {
  const row = sheet.addRow(headers);
  row.eachCell(styleHeaderCell);
  return row;
}

function addNoDataRow(sheet: ExcelJS.Worksheet, message: string): void {
  sheet.addRow([message]).font = MUTED_FONT;
}

function setColumnFormats(sheet: ExcelJS.Worksheet, widths: number[], formats: Array<string | null>, firstColumn = 1): void {
  widths.forEach((width, index) => {
    const column = sheet.getColumn(firstColumn + index);
    column.width = width;
    const format = formats[index];
    if (format) {
      column.numFmt = format;
    }
  });
}

const PERIOD_HEADERS = ["Period", "First Date", "Revenue (Baseline)", "Revenue (Simulation)", "CR (Simulation)", "AOV (Simulation)"];

// Period totals beside the daily rows, starting at `firstColumn` on row 1
function writePeriodTotals(sheet: ExcelJS.Worksheet, firstColumn: number, title: string, periods: PeriodAggregate[]): void {
  setColumnFormats(
    sheet,
    [10, 12, 18, 20, 16, 16],
    [null, null, CURRENCY_FORMAT, CURRENCY_FORMAT, PERCENT_FORMAT, CURRENCY_FORMAT],
    firstColumn,
  );

  const titleCell = sheet.getCell(1, firstColumn);
  titleCell.value = title;
  titleCell.font = { bold: true, size: 13 };
  sheet.mergeCells(1, firstColumn, 1, firstColumn + PERIOD_HEADERS.length - 1);

  PERIOD_HEADERS.forEach((header, offset) => {
    const cell = sheet.getCell(2, firstColumn + offset);
    cell.value = header;
    styleHeaderCell(cell);
  });

  if (periods.length === 0) {
    const cell = sheet.getCell(3, firstColumn);
    cell.value = "No period totals available.";
    cell.font = MUTED_FONT;
    return;
  }
  periods.forEach((period, index) => {
    const values = [
      period.period,
      period.firstDate,
      period.revenueBase,
      period.revenueSim,
      period.conversionRateSim,
      period.orderValueSim,
    ];
    values.forEach((value, offset) => {
      sheet.getCell(3 + index, firstColumn + offset).value = value;
    });
  });
}

function addProjectionSheet(workbook: ExcelJS.Workbook, context: ExcelReportContext): void {
  const sheet = workbook.addWorksheet("Projections");
  const headers = [
    "Date",
    "Shock",
    "Sessions (Baseline)",
    "Conversions (Baseline)",
    "Revenue (Baseline)",
    "Sessions (Simulation)",
    "Conversions (Simulation)",
    "Revenue (Simulation)",
    "Revenue Min",
    "Revenue Max",
  ];
  setColumnFormats(
    sheet,
    [12, 10, 18, 20, 18, 20, 22, 20, 14, 14],
    [null, PERCENT_FORMAT, INTEGER_FORMAT, INTEGER_FORMAT, CURRENCY_FORMAT, INTEGER_FORMAT, INTEGER_FORMAT, CURRENCY_FORMAT, CURRENCY_FORMAT, CURRENCY_FORMAT],
  );
  addHeaderRow(sheet, headers);

  if (context.rows.length === 0) {
    addNoDataRow(sheet, "No projection available for the current trial window.");
  }
  for (const row of context.rows) {
    sheet.addRow([
      row.date,
      row.shock,
      row.sessionsBase,
      row.conversionsBase,
      row.revenueBase,
      row.sessionsSim,
      row.conversionsSim,
      row.revenueSim,
      row.revenueSimMin,
      row.revenueSimMax,
    ]);
  }

  writePeriodTotals(sheet, headers.length + 2, `${context.context.granularity} totals`, context.periods);
}

function addEventLogSheet(workbook: ExcelJS.Workbook, context: ExcelReportContext): void {
  const sheet = workbook.addWorksheet("Event Log");
  setColumnFormats(sheet, [6, 16, 60, 14], [null, null, null, null]);
  addHeaderRow(sheet, ["#", "Event", "Description", "Scope"]);

  if (context.events.length === 0) {
    addNoDataRow(sheet, "No events in the log.");
    return;
  }
  context.events.forEach((event, index) => {
    const { label, description, scope } = describeEvent(event);
    sheet.addRow([index + 1, label, description, scope]);
  });
}

function addAttributionSheet(workbook: ExcelJS.Workbook, context: ExcelReportContext): void {
  const sheet = workbook.addWorksheet("Attribution");
  sheet.getColumn(1).width = 28;
  sheet.getColumn(2).width = 60;
  sheet.getColumn(3).width = 18;
  sheet.getColumn(4).width = 18;

  const report = context.attribution;
  if (!report || report.status !== "ok") {
    addNoDataRow(sheet, "Attribution unavailable: the target window has no days in the projection year.");
    return;
  }

  addHeaderRow(sheet, ["Summary", "Value"]);
  sheet.addRow(["Metric", report.metric]);
  sheet.addRow(["Organic (empty log)", report.organic]);
  sheet.addRow(["Needed", report.needed]);
  sheet.addRow(["Gap", report.gap]);
  sheet.addRow(["Simulated (full log)", report.simulated]);
  sheet.addRow([]);

  addHeaderRow(sheet, ["Event", "Description", "Contribution", "Gap Coverage"]);
  if (report.rows.length === 0) {
    addNoDataRow(sheet, "No events to attribute.");
    return;
  }
  for (const row of report.rows) {
    const excelRow = sheet.addRow([row.label, row.description, row.contribution, row.gapCoveragePct / 100]);
    excelRow.getCell(3).numFmt = CURRENCY_FORMAT;
    excelRow.getCell(4).numFmt = PERCENT_FORMAT;
  }
}

function addSignatureSheet(workbook: ExcelJS.Workbook, context: ExcelReportContext): void {
  const sheet = workbook.addWorksheet("Signature Library");
  setColumnFormats(
    sheet,
    [30, 12, 12, 10, 16, 18, 16, 14, 14],
    [null, null, null, null, INTEGER_FORMAT, INTEGER_FORMAT, CURRENCY_FORMAT, PERCENT_FORMAT, PERCENT_FORMAT],
  );
  addHeaderRow(sheet, [
    "Name",
    "Origin Start",
    "Origin End",
    "Days",
    "Excess Sessions",
    "Excess Conversions",
    "Excess Revenue",
    "Organic CR",
    "Event CR",
  ]);

  if (context.signatures.length === 0) {
    addNoDataRow(sheet, "No signatures in the library.");
    return;
  }
  for (const signature of context.signatures) {
    sheet.addRow([
      signature.name,
      signature.originStart,
      signature.originEnd,
      signature.duration,
      signature.totals.sessions,
      signature.totals.conversions,
      signature.totals.revenue,
      signature.organicConversionRate,
      signature.eventConversionRate,
    ]);
  }
}

function addConfigSheet(workbook: ExcelJS.Workbook, context: ExcelReportContext): void {
  const sheet = workbook.addWorksheet("Report Config");
  sheet.getColumn(1).width = 30;
  sheet.getColumn(2).width = 60;

  const { trial, target } = context.context;
  addHeaderRow(sheet, ["Setting", "Value"]);
  sheet.addRow(["Report generated at", formatDateTime(context.generatedAt)]);
  sheet.addRow(["Entities", context.entities.length > 0 ? context.entities.join(", ") : "None"]);
  sheet.addRow(["Granularity", context.context.granularity]);
  sheet.addRow(["Trial window", `${trial.start} → ${trial.end}`]);
  sheet.addRow(["Trial sessions", trial.sessions]);
  sheet.addRow(["Trial conversions", trial.conversions]);
  sheet.addRow(["Trial revenue", trial.revenue]);
  sheet.addRow([
    "Trial adjustment (%)",
    `sessions ${trial.adjustment.sessions}, conversions ${trial.adjustment.conversions}, revenue ${trial.adjustment.revenue}`,
  ]);
  sheet.addRow(["Target window", `${target.start} → ${target.end}`]);
  sheet.addRow(["Target", `${target.metric} ${target.value} (driver: ${target.driver})`]);

  if (context.constants) {
    sheet.addRow(["Base sessions / day", context.constants.baseSessions]);
    sheet.addRow(["Base conversion rate", context.constants.baseConversionRate]);
    sheet.addRow(["Base order value", context.constants.baseOrderValue]);
  } else {
    sheet.addRow(["Calibration", "Not calibrated"]);
  }

  sheet.addRow([]);
  addHeaderRow(sheet, ["Year", "Similarity Weight"]);
  const weights = Object.entries(context.weights);
  if (weights.length === 0) {
    addNoDataRow(sheet, "No historical year overlaps the trial window.");
  }
  for (const [year, weight] of weights) {
    const row = sheet.addRow([year, weight]);
    row.getCell(2).numFmt = PERCENT_FORMAT;
  }
}

export async function buildExcelReport(context: ExcelReportContext): Promise<Buffer> {
  const generatedAt = new Date(context.generatedAt);
  const workbook = new ExcelJS.Workbook();
  workbook.creator = "Demand DNA Lab";
  workbook.created = generatedAt;
  workbook.modified = generatedAt;
  workbook.properties.date1904 = false;

  addProjectionSheet(workbook, context);
  addEventLogSheet(workbook, context);
  addAttributionSheet(workbook, context);
  addSignatureSheet(workbook, context);
  addConfigSheet(workbook, context);

  const buffer = await workbook.xlsx.writeBuffer();
  return Buffer.isBuffer(buffer) ? buffer : Buffer.from(buffer);
}
