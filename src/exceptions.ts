export class PacketError extends Error {
	private _context: string[] = [];
	private _detail: string;

	constructor(message?: string) {
		super(message);
		this.name = "PacketError";
		this._detail = message ?? "";
	}

	get context(): readonly string[] {
		return this._context;
	}

	addContext(label: string): this {
		this._context.unshift(label);
		this.message = [...this._context, this._detail].join(": ");
		return this;
	}
}

export class OutOfBoundsError extends PacketError {
	constructor(message?: string) {
		super(message);
		this.name = "OutOfBoundsError";
	}
}

export class MalformedHeaderError extends PacketError {
	constructor(message?: string) {
		super(message);
		this.name = "MalformedHeaderError";
	}
}

export class TrailingDataError extends PacketError {
	private _trailingBytes: number;

	constructor(message: string, trailingBytes: number) {
		super(message);
		this.name = "TrailingDataError";
		this._trailingBytes = trailingBytes;
	}

	get trailingBytes(): number {
		return this._trailingBytes;
	}
}

export class UnsupportedExtensionProfileError extends PacketError {
	private _profile: number;

	constructor(message: string, profile: number) {
		super(message);
		this.name = "UnsupportedExtensionProfileError";
		this._profile = profile;
	}

	get profile(): number {
		return this._profile;
	}
}

export class AmbiguousPacketTypeError extends PacketError {
	constructor(message?: string) {
		super(message);
		this.name = "AmbiguousPacketTypeError";
	}
}

export class InvalidValueError extends PacketError {
	constructor(message?: string) {
		super(message);
		this.name = "InvalidValueError";
	}
}
