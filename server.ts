/**
 * Main server entry point
 * Loads the routing table, sizes the dedup store and starts listening
 */

import { createApp } from './app';
import { sendWarningAlert } from './api/slack';
import { config } from './config/env';
import { loadRoutingTable } from './config/routingTable';
import { setDedupCapacity } from './state/processedMessages';

const loaded = loadRoutingTable(config.routingTablePath);
setDedupCapacity(config.dedupMaxEntries);

const app = createApp();
const PORT = config.port;

app.listen(PORT, () => {
  console.log(`🚀 Server running on port ${PORT}`);
  console.log(`📡 Environment: ${config.environment}`);
  console.log(`🗺️  Routing table: ${loaded} countries`);
  console.log(`✅ Ready to receive webhooks:`);
  console.log(`   - JotForm: http://localhost:${PORT}/webhook/jotform`);
  console.log(`   - Mailgun inbound: http://localhost:${PORT}/webhook/mailgun-incoming`);
  console.log(`   - Forward action: http://localhost:${PORT}/action/forward-to-distributor/:sessionId`);

  if (loaded === 0) {
    void sendWarningAlert('Routing table is empty - submissions will use default agents only', {
      event: 'startup',
    });
  }
});
