import { google, type drive_v3, type sheets_v4 } from 'googleapis';
import { log } from '../logger.js';
import { EXPORT_HEADER, toRows } from './columns.js';
import type { JobListing } from '../types.js';
import type { RecordSink } from './types.js';

const SCOPES = ['https://www.googleapis.com/auth/spreadsheets', 'https://www.googleapis.com/auth/drive'];
const SPREADSHEET_MIME = 'application/vnd.google-apps.spreadsheet';

export interface SpreadsheetClient {
  find(title: string): Promise<string | null>;
  create(title: string): Promise<string>;
  append(spreadsheetId: string, rows: string[][]): Promise<void>;
}

export class GoogleSpreadsheetClient implements SpreadsheetClient {
  private readonly sheets: sheets_v4.Sheets;
  private readonly drive: drive_v3.Drive;

  constructor(keyFile: string) {
    const auth = new google.auth.GoogleAuth({ keyFile, scopes: SCOPES });
    this.sheets = google.sheets({ version: 'v4', auth });
    this.drive = google.drive({ version: 'v3', auth });
  }

  async find(title: string): Promise<string | null> {
    const escaped = title.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
    const res = await this.drive.files.list({
      q: `name = '${escaped}' and mimeType = '${SPREADSHEET_MIME}' and trashed = false`,
      fields: 'files(id, name)',
      pageSize: 1,
    });
    return res.data.files?.[0]?.id ?? null;
  }

  async create(title: string): Promise<string> {
    const res = await this.sheets.spreadsheets.create({
      requestBody: { properties: { title } },
      fields: 'spreadsheetId',
    });
    const id = res.data.spreadsheetId;
    if (!id) throw new Error(`Spreadsheet "${title}" was created without an id`);
    return id;
  }

  async append(spreadsheetId: string, rows: string[][]): Promise<void> {
    await this.sheets.spreadsheets.values.append({
      spreadsheetId,
      range: 'A1',
      valueInputOption: 'RAW',
      insertDataOption: 'INSERT_ROWS',
      requestBody: { values: rows },
    });
  }
}

// Spreadsheet looked up by title; created with a header row when missing.
export class SheetsRecordSink implements RecordSink {
  readonly name = 'google-sheets';
  private readonly client: SpreadsheetClient;
  private readonly title: string;

  constructor(client: SpreadsheetClient, title: string) {
    this.client = client;
    this.title = title;
  }

  async write(records: readonly JobListing[], letterPaths: ReadonlyMap<string, string>): Promise<void> {
    let spreadsheetId = await this.client.find(this.title);
    if (spreadsheetId) {
      log.info(`Opened spreadsheet "${this.title}"`);
    } else {
      spreadsheetId = await this.client.create(this.title);
      await this.client.append(spreadsheetId, [EXPORT_HEADER]);
      log.info(`Created spreadsheet "${this.title}"`);
    }

    if (records.length === 0) return;
    await this.client.append(spreadsheetId, toRows(records, letterPaths));
    log.info(`${records.length} listings appended to https://docs.google.com/spreadsheets/d/${spreadsheetId}`);
  }
}
