import mimeTypes from 'mime-types';
import { FileFormat } from '../types';

// File type detection utilities
export class FileDetectionService {
  /**
   * Detect file format from the filename. A `.json` file may still hold JSON
   * Lines; the JSON reader settles that with sniffJsonLayout.
   */
  static detectFileFormat(filename: string): FileFormat {
    const extension = filename.toLowerCase().split('.').pop();

    if (extension === 'jsonl' || extension === 'ndjson') {
      return FileFormat.JSONL;
    }

    switch (mimeTypes.lookup(filename)) {
      case 'text/csv':
        return FileFormat.CSV;
      case 'application/json':
        return FileFormat.JSON;
    }

    switch (extension) {
      case 'csv':
      case 'tsv':
        return FileFormat.CSV;
      case 'json':
        return FileFormat.JSON;
      default:
        return FileFormat.UNKNOWN;
    }
  }

  /**
   * A JSON document starting with an object on its first line, followed by
   * more lines, is treated as JSON Lines
   */
  static sniffJsonLayout(head: string): FileFormat {
    const trimmed = head.replace(/^\uFEFF/, '').trimStart();
    if (trimmed.startsWith('[')) {
      return FileFormat.JSON;
    }
    const lines = trimmed.split(/\r?\n/).filter(line => line.trim().length > 0);
    if (lines.length > 1 && lines[0].trim().startsWith('{')) {
      return FileFormat.JSONL;
    }
    return FileFormat.JSON;
  }
}

export default FileDetectionService;
