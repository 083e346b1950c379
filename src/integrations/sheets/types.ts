export type SheetRow = string[]

/** The slice of the Sheets API the spreadsheet store needs. Row numbers are 1-based. */
export interface SheetsApi {
  getTitle(): Promise<string | undefined>
  listTabs(): Promise<string[]>
  addTab(title: string, headers: string[], rowCount: number): Promise<void>
  readRows(tab: string): Promise<SheetRow[]>
  updateRow(tab: string, rowNumber: number, values: string[]): Promise<void>
  clearRow(tab: string, rowNumber: number, width: number): Promise<void>
  appendRow(tab: string, values: string[]): Promise<void>
}
