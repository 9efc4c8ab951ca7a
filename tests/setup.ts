// Test setup file
import * as fs from 'fs';
import * as path from 'path';

process.env.NODE_ENV = 'test';

// Keep service loggers quiet unless a test run asks for them
process.env.LOG_LEVEL = process.env.TEST_LOG_LEVEL ?? 'error';

// Load .env.test if it exists
const envTestPath = path.resolve(process.cwd(), '.env.test');
if (fs.existsSync(envTestPath)) {
  const envContent = fs.readFileSync(envTestPath, 'utf-8');
  envContent.split('\n').forEach(line => {
    const trimmed = line.trim();
    if (trimmed && !trimmed.startsWith('#')) {
      const [key, ...valueParts] = trimmed.split('=');
      if (key && valueParts.length > 0) {
        process.env[key.trim()] = valueParts.join('=').trim();
      }
    }
  });
}
