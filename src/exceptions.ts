export class RtcpError extends Error {
	constructor(message?: string) {
		super(message);
		this.name = "RtcpError";
	}
}

export class PacketTooShortError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "PacketTooShortError";
	}
}

export class InvalidHeaderError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "InvalidHeaderError";
	}
}

export class BadVersionError extends RtcpError {
	private _version: number;

	constructor(message: string, version: number) {
		super(message);
		this.name = "BadVersionError";
		this._version = version;
	}

	get version(): number {
		return this._version;
	}
}

export class WrongPacketTypeError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "WrongPacketTypeError";
	}
}

export class MalformedPacketError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "MalformedPacketError";
	}
}

export class InvalidPaddingError extends MalformedPacketError {
	constructor(message?: string) {
		super(message);
		this.name = "InvalidPaddingError";
	}
}

export class InvalidFieldError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "InvalidFieldError";
	}
}

export class BufferFullError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "BufferFullError";
	}
}

export class EmptyCompoundError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "EmptyCompoundError";
	}
}

export class BadFirstPacketError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "BadFirstPacketError";
	}
}

export class MissingCnameError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "MissingCnameError";
	}
}

export class PacketBeforeCnameError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "PacketBeforeCnameError";
	}
}

export class SettingsError extends RtcpError {
	constructor(message?: string) {
		super(message);
		this.name = "SettingsError";
	}
}
