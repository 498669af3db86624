import {
	Inject,
	Injectable,
	Logger,
	OnModuleDestroy,
	OnModuleInit,
} from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import { type ContractEvent, LedgerHost } from "@fundchain/ledger";
import { LedgerEvent, ledgerEventName } from "../common/ledger.event";
import { LEDGER_HOST } from "./ledger.constants";

/**
 * Forwards every committed contract event to the application event bus.
 */
@Injectable()
export class LedgerEventsBridge implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(LedgerEventsBridge.name);
	private unsubscribe: (() => void) | null = null;

	constructor(
		@Inject(LEDGER_HOST) private readonly host: LedgerHost,
		private readonly events: EventEmitter2,
	) {}

	onModuleInit(): void {
		this.unsubscribe = this.host.subscribe((event) => this.forward(event));
	}

	onModuleDestroy(): void {
		this.unsubscribe?.();
		this.unsubscribe = null;
	}

	private forward(event: ContractEvent): void {
		const name = ledgerEventName(event.topic);
		const payload: LedgerEvent = {
			eventId: nanoid(),
			contract: event.contract,
			topic: event.topic,
			data: event.data,
			sequence: event.sequence,
			committedAt: new Date(event.timestamp * 1000).toISOString(),
		};
		this.logger.debug(`${name} from ${event.contract} at sequence ${event.sequence}`);
		this.events.emit(name, payload);
	}
}
