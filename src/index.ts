import 'dotenv/config';
import { createApp } from './app';
import { loadConfig } from './config';
import { ParseError, describeError } from './errors';
import { LedgerEngine } from './ledger';
import { createFileStore } from './store';

const config = loadConfig();
const ledger = new LedgerEngine({
  store: createFileStore(config.dataFile, config.categoriesFile),
  owners: config.owners
});
const app = createApp(ledger, { currencySymbol: config.currencySymbol });

// Load the backing file; a malformed file either stops startup or is left alone until the first write
function loadLedger(): void {
  try {
    const result = ledger.load();
    console.log(`Loaded ${result.recordCount} expenses from ${config.dataFile}`);
    if (result.adoptedCategories.length > 0) {
      console.log(`Registered categories found in records: ${result.adoptedCategories.join(', ')}`);
    }
  } catch (error) {
    if (error instanceof ParseError && config.loadFailurePolicy === 'start-empty') {
      console.error(`Could not parse ${error.path}, starting with an empty ledger: ${error.message}`);
      return;
    }
    throw error;
  }
}

// Graceful shutdown
function shutdown(): void {
  console.log('\nShutting down gracefully...');
  if (ledger.hasUnsavedChanges()) {
    try {
      ledger.save();
    } catch (error) {
      console.error('Unsaved changes could not be written:', describeError(error));
    }
  }
  process.exit(0);
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

function start(): void {
  try {
    loadLedger();
    app.listen(config.port, () => {
      console.log(`Expense Ledger API running on http://localhost:${config.port}`);
      console.log('Available endpoints:');
      console.log('  POST   /expenses                     - Create an expense');
      console.log('  GET    /expenses                     - List expenses (query: start, end, category, owner, q, page, limit)');
      console.log('  GET    /expenses/:id                 - Fetch an expense');
      console.log('  PUT    /expenses/:id                 - Replace an expense');
      console.log('  DELETE /expenses/:id                 - Delete an expense');
      console.log('  DELETE /expenses                     - Delete every expense');
      console.log('  GET    /stats                        - Totals, category breakdown and monthly trend');
      console.log('  GET    /stats/monthly/:year/:month   - Monthly summary');
      console.log('  GET    /categories                   - List categories');
      console.log('  POST   /categories                   - Add a category');
      console.log('  DELETE /categories/:key              - Delete a category');
      console.log('  GET    /owners                       - List owners');
      console.log('  GET    /export                       - Export every expense');
      console.log('  POST   /import                       - Merge an uploaded export');
      console.log('  GET    /health                       - Health check');
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
}

start();

export default app;
