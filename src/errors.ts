import { formatLocation, type Location } from './core/tokens';

// Fatal: aborts the parse of the current file. No partial tree is returned.
export class ParseError extends Error {
	readonly location: Location;
	readonly observed: string;
	readonly expected: string;

	constructor(message: string, location: Location, observed: string, expected: string) {
		super(`${message} at ${formatLocation(location)} (expected ${expected}, got ${observed})`);
		this.name = 'ParseError';
		this.location = location;
		this.observed = observed;
		this.expected = expected;
	}
}

// A grammar-table or dispatch defect rather than bad input.
export class InternalParseError extends ParseError {
	constructor(message: string, location: Location, observed: string, expected: string) {
		super(message, location, observed, expected);
		this.name = 'InternalParseError';
	}
}

// A command-spec table or configuration file could not be read or failed validation.
export class RegistryError extends Error {
	readonly source: string;

	constructor(message: string, source: string) {
		super(`${source}: ${message}`);
		this.name = 'RegistryError';
		this.source = source;
	}
}
