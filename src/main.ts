import { createInterface } from 'readline';
import { createClient } from './index.js';
import { ClaudeClient } from './core/claude-client.js';
import { TokenPool } from './core/token-pool.js';
import { ChatMessage } from './core/types.js';
import { ConfigurationError } from './core/errors.js';
import { loadConfig, RelayConfig } from './lib/config.js';
import { stderrLogger } from './lib/logger.js';

let config: RelayConfig;
let pool: TokenPool;
let client: ClaudeClient;
try {
  config = loadConfig();
  pool = TokenPool.fromFile(config.tokenFile, stderrLogger);
  client = createClient(config, { logger: stderrLogger, pool });
} catch (error) {
  if (!(error instanceof ConfigurationError)) throw error;
  console.error(`Error: ${error.message}`);
  process.exit(1);
}

const history: ChatMessage[] = [];

const rl = createInterface({
  input: process.stdin,
  output: process.stdout
});

console.log(`claude-relay (${client.provider.name}, ${pool.available}/${pool.size} tokens available)`);
console.log('Type "/reset" to clear exhausted tokens, "/exit" to quit');

function ask() {
  rl.question('> ', async (input) => {
    const line = input.trim();
    if (line === '/exit') {
      rl.close();
      return;
    }
    if (line === '/reset') {
      pool.resetAll();
      ask();
      return;
    }
    if (!line) {
      ask();
      return;
    }

    history.push({ role: 'user', content: line });
    let answer = '';
    try {
      for await (const event of client.streamChat(history, config.model)) {
        if (event.type === 'answer') {
          answer += event.text;
          process.stdout.write(event.text);
        } else {
          console.error(`\n[${event.reason}] ${event.message}`);
        }
      }
      console.log();
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : error);
    }

    if (answer) {
      history.push({ role: 'assistant', content: answer });
    } else {
      history.pop();  // keep user/assistant turns alternating
    }

    ask();
  });
}

ask();
