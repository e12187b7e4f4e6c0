#!/usr/bin/env node
import { createConnection, ProposedFeatures } from 'vscode-languageserver/node.js';

import { createServer } from './server.js';

const server = createServer(createConnection(ProposedFeatures.all));
server.listen();
