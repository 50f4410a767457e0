// src/services/StorageService.ts

import fs from 'fs';
import path from 'path';

export class StorageService {
  static loadJson<T>(filePath: string, defaultValue: T, isValid: (value: unknown) => value is T): T {
    if (fs.existsSync(filePath)) {
      try {
        const raw: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        return isValid(raw) ? raw : defaultValue;
      } catch (err) {
        console.warn(`⚠️ JSON ilegível em ${filePath}, usando valor padrão:`, err instanceof Error ? err.message : err);
        return defaultValue;
      }
    }
    return defaultValue;
  }

  static saveJson<T>(filePath: string, data: T) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, JSON.stringify(data, null, 2), 'utf-8');
  }
}
