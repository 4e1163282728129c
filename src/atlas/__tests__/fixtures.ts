import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import Database from 'better-sqlite3';
import { assignAccessions } from '../accession.js';
import { PREDICTION_COLUMNS, RecordStore } from '../store.js';
import type { PredictionRow } from '../types.js';

export type FixtureRecord = Partial<PredictionRow>;

const CREATE_TABLE = `
  CREATE TABLE predictions (
    AC TEXT PRIMARY KEY,
    PMID TEXT,
    UniProtKB_accessions TEXT,
    Has_Mechanism TEXT,
    Mechanism_Probability REAL,
    Autoregulatory_Type TEXT,
    Type_Confidence REAL,
    Polarity TEXT,
    Title TEXT,
    Abstract TEXT,
    Journal TEXT,
    Authors TEXT,
    Year INTEGER,
    Month TEXT,
    Source TEXT,
    Protein_Name TEXT,
    Gene_Name TEXT,
    Protein_ID TEXT,
    OS TEXT
  )`;

/**
 * Five publications: two autophosphorylation records, one autolysis, one
 * non-mechanism record and one autoregulation record without a title.
 */
export const STANDARD_RECORDS: FixtureRecord[] = [
  {
    PMID: '1001', Source: 'UniProt', Autoregulatory_Type: 'Autophosphorylation', Polarity: '+',
    Title: 'Kinase autophosphorylation in yeast', Year: 2015, Month: 'Mar', Journal: 'J Biol Chem',
    OS: 'Homo sapiens', Has_Mechanism: 'Yes', UniProtKB_accessions: 'P12345, Q99999', Authors: 'Smith J',
    Protein_Name: 'Kinase A', Gene_Name: 'KINA', Protein_ID: 'KINA_HUMAN',
    Mechanism_Probability: 0.95, Type_Confidence: 0.9,
  },
  {
    PMID: '1002', Source: 'Non-UniProt', Autoregulatory_Type: 'Autophosphorylation', Polarity: null,
    Title: 'Receptor self-phosphorylation', Year: 2018, Month: 'Jul', Journal: 'Nature',
    OS: 'Mus musculus', Has_Mechanism: 'Yes', UniProtKB_accessions: 'Q11111', Authors: 'Garcia M',
    Protein_Name: 'Receptor B', Gene_Name: 'RECB', Protein_ID: 'NA_1002',
    Mechanism_Probability: 0.88, Type_Confidence: 0.7,
  },
  {
    PMID: '1003', Source: 'Non-UniProt', Autoregulatory_Type: 'Autolysis', Polarity: null,
    Title: 'Protease autolysis', Year: 2020, Month: 'Jan', Journal: 'J Biol Chem',
    OS: 'Homo sapiens', Has_Mechanism: 'Yes', UniProtKB_accessions: 'P12346', Authors: 'Chen L',
    Protein_Name: 'Protease C', Gene_Name: 'PRTC', Protein_ID: 'PRTC_HUMAN',
    Mechanism_Probability: 0.81, Type_Confidence: 0.66,
  },
  {
    PMID: '1004', Source: 'Non-UniProt', Autoregulatory_Type: 'none', Polarity: null,
    Title: 'Unrelated study of 50% growth_rate', Year: 'Unknown', Month: null, Journal: 'Cell',
    OS: 'Homo sapiens', Has_Mechanism: 'No', Authors: 'Okafor T',
    Mechanism_Probability: 0.12,
  },
  {
    PMID: '1005', Source: 'UniProt', Autoregulatory_Type: 'Autoregulation', Polarity: null,
    Title: null, Year: 2012, Month: 'Mar', Journal: 'Nature',
    OS: 'Escherichia coli', Has_Mechanism: 'Yes', UniProtKB_accessions: 'P99999', Authors: 'Lee K',
    Protein_Name: 'Regulator R', Gene_Name: 'regR', Protein_ID: 'REGR_ECOLI',
    Mechanism_Probability: 0.9, Type_Confidence: 0.8,
  },
];

/** `count` records from one predicted source with PMIDs 2000, 2001, ... */
export function bulkRecords(count: number): FixtureRecord[] {
  return Array.from({ length: count }, (_, i) => ({
    PMID: String(2000 + i),
    Source: 'Non-UniProt',
    Autoregulatory_Type: i % 2 === 0 ? 'Autoinhibition' : 'Autocatalysis',
    Title: `Bulk record ${i}`,
    Year: 2000 + (i % 10),
    Journal: 'Bulk Journal',
    Has_Mechanism: 'Yes',
  }));
}

export interface FixtureDb {
  dbPath: string;
  dir: string;
  open: () => RecordStore;
  cleanup: () => void;
}

/** Write `records` into a fresh SQLite file; accessions are assigned unless given. */
export function createFixtureDb(records: FixtureRecord[] = STANDARD_RECORDS, create = CREATE_TABLE): FixtureDb {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'atlas-test-'));
  const dbPath = path.join(dir, 'predictions.db');
  const db = new Database(dbPath);
  db.exec(create);

  if (records.length) {
    const accessions = assignAccessions(records.map(r => ({ pmid: r.PMID, source: r.Source })));
    const insert = db.prepare(
      `INSERT INTO predictions (${PREDICTION_COLUMNS.join(', ')}) VALUES (${PREDICTION_COLUMNS.map(c => '@' + c).join(', ')})`
    );
    const insertAll = db.transaction((rows: FixtureRecord[]) => {
      rows.forEach((r, i) => {
        const values: Record<string, string | number | null> = {};
        for (const col of PREDICTION_COLUMNS) values[col] = r[col] ?? null;
        values.AC = r.AC ?? accessions[i];
        insert.run(values);
      });
    });
    insertAll(records);
  }
  db.close();

  const opened: RecordStore[] = [];
  return {
    dbPath,
    dir,
    open: () => {
      const store = RecordStore.open(dbPath);
      opened.push(store);
      return store;
    },
    cleanup: () => {
      for (const s of opened) s.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}
