// Application entrypoint: wires the engine to the HTTP mark-price feed and a
// paper order gateway, submits signals from SIGNAL_FILE and runs the monitor
// until SIGINT/SIGTERM.

import dotenv from 'dotenv';
dotenv.config();

import fs from 'fs';
import { loadAppConfig } from './utils/config';
import { loadRiskConfig } from './config/risk-config';
import { HttpPriceFeed } from './adapters/price-feed';
import { FilePositionStore } from './adapters/position-store';
import { PaperOrderGateway } from './api/paper-gateway';
import { TradingEngine } from './application/engine';
import { errorMessage } from './application/errors';
import { log, setLoggerContext } from './utils/logger';

export * from './contracts';
export * from './types/domain';
export { TradingEngine } from './application/engine';
export type { EngineOptions, EngineHealth } from './application/engine';
export { buildRiskConfig, loadRiskConfig, DEFAULT_RISK_CONFIG } from './config/risk-config';
export { validateSignal, parseSignal } from './core/signal';
export { computePositionSize, evaluateAdmission, deriveTargets } from './core/risk';
export { PositionMachine } from './core/position';
export { HttpPriceFeed, StaticPriceFeed } from './adapters/price-feed';
export { FilePositionStore, InMemoryPositionStore } from './adapters/position-store';
export { PaperOrderGateway } from './api/paper-gateway';
export * from './application/errors';

function readSignals(file: string): unknown[] {
	const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
	return Array.isArray(raw) ? raw : [raw];
}

export async function main(): Promise<TradingEngine> {
	const app = loadAppConfig();
	setLoggerContext({ mode: app.dryRun ? 'paper' : 'live' });
	const feed = new HttpPriceFeed({
		baseUrl: app.priceFeedUrl,
		cacheTtlMs: app.priceCacheTtlMs,
		retryAttempts: app.retryAttempts,
		retryBackoffMs: app.retryBackoffMs,
	});
	if (!app.dryRun) log('WARN', 'CONFIG', 'no live order gateway is bundled; orders go to the paper gateway');
	const engine = new TradingEngine({
		gateway: new PaperOrderGateway({ feed }),
		feed,
		repository: new FilePositionStore(app.positionStoreDir),
		riskConfig: loadRiskConfig(),
		account: { equity: app.accountEquity },
	});
	const restored = await engine.rehydrate();
	log('INFO', 'ENGINE', 'ready', { restored, storeDir: app.positionStoreDir, intervalMs: app.loopIntervalMs });
	if (app.signalFile) {
		for (const s of readSignals(app.signalFile)) {
			try {
				const p = await engine.submitSignal(s);
				log('INFO', 'ENGINE', 'signal accepted', { positionId: p.id, status: p.status });
			} catch (e) {
				log('WARN', 'ENGINE', 'signal not accepted', { message: errorMessage(e) });
			}
		}
	}
	engine.start();
	return engine;
}

if (require.main === module) {
	main().then((engine) => {
		const shutdown = () => {
			engine.stop()
				.then(() => { engine.dispose(); process.exit(0); })
				.catch((err: unknown) => { log('FATAL', 'ENGINE', 'shutdown failed', { message: errorMessage(err) }); process.exit(1); });
		};
		process.once('SIGINT', shutdown);
		process.once('SIGTERM', shutdown);
	}).catch((err: unknown) => {
		log('FATAL', 'ENGINE', 'startup failed', { message: errorMessage(err) });
		process.exitCode = 1;
	});
}
