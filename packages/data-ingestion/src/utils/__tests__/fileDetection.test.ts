import { describe, it, expect } from '@jest/globals';
import { FileDetectionService } from '../fileDetection';
import { FileFormat } from '../../types';

describe('FileDetectionService', () => {
  it('detects formats from the file name', () => {
    expect(FileDetectionService.detectFileFormat('customers.csv')).toBe(FileFormat.CSV);
    expect(FileDetectionService.detectFileFormat('export.tsv')).toBe(FileFormat.CSV);
    expect(FileDetectionService.detectFileFormat('sentiment.json')).toBe(FileFormat.JSON);
    expect(FileDetectionService.detectFileFormat('posts.ndjson')).toBe(FileFormat.JSONL);
    expect(FileDetectionService.detectFileFormat('notes.txt')).toBe(FileFormat.UNKNOWN);
  });

  it('sniffs JSON Lines behind a .json name', () => {
    expect(FileDetectionService.sniffJsonLayout('{"id": 1}\n{"id": 2}\n')).toBe(FileFormat.JSONL);
    expect(FileDetectionService.sniffJsonLayout('\n  [{"id": 1}]')).toBe(FileFormat.JSON);
    expect(FileDetectionService.sniffJsonLayout('\uFEFF[{"id": 1}]')).toBe(FileFormat.JSON);
    expect(FileDetectionService.sniffJsonLayout('{"id": 1}')).toBe(FileFormat.JSON);
  });
});
