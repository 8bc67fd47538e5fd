import type { Decimal } from "../shared/decimal.js";
import type { ClosedPositionRecord, Position } from "./types.js";

export function formatSize(size: Decimal): string {
	return size.abs().toFixed(2);
}

export function formatPrice(price: Decimal): string {
	return price.toFixed(4);
}

/** `+$1.50` / `-$0.25` */
export function formatPnl(pnl: Decimal): string {
	return `${pnl.isNegative() ? "-" : "+"}$${pnl.abs().toFixed(2)}`;
}

export function direction(position: Position): "LONG" | "SHORT" {
	return position.netSize.isNegative() ? "SHORT" : "LONG";
}

export function displayName(title: string, outcome: string): string {
	return title.length > 0 ? `${title} [${outcome}]` : outcome;
}

export function openedMessage(position: Position): string {
	return `OPENED ${direction(position)} ${formatSize(position.netSize)} ${position.outcome} @ ${formatPrice(position.avgEntryPrice)} | ${position.title}`;
}

export function increasedMessage(position: Position): string {
	return `INCREASED ${direction(position)} ${position.outcome} to ${formatSize(position.netSize)} @ avg ${formatPrice(position.avgEntryPrice)} | ${position.title}`;
}

export function closedMessage(label: string, record: ClosedPositionRecord): string {
	return `${label} ${formatSize(record.size)} ${record.outcome} @ ${formatPrice(record.exitPrice)} (entry ${formatPrice(record.entryPrice)}) P&L ${formatPnl(record.realizedPnl)} | ${record.title}`;
}

export function reversedMessage(record: ClosedPositionRecord, position: Position): string {
	return `REVERSED ${record.outcome}: closed ${formatSize(record.size)} P&L ${formatPnl(record.realizedPnl)}, now ${direction(position)} ${formatSize(position.netSize)} @ ${formatPrice(position.avgEntryPrice)} | ${record.title}`;
}

export function hedgeMessage(label: string, record: ClosedPositionRecord): string {
	return `${label} ${record.outcome} ${formatSize(record.size)} locked P&L ${formatPnl(record.realizedPnl)} | ${record.title}`;
}
