import { CodecError, MAX_INT64, MIN_INT64, isInt64 } from '../core';

// JS Date 可表示的毫秒范围
// EN: Millisecond range a JS Date can represent
const MAX_DATE_MILLIS = 8.64e15;

const RFC3339_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})[Tt](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:([Zz])|([+-])(\d{2}):(\d{2}))$/;

/**
 * UTC 日期时间：自纪元起的有符号 64 位毫秒数
 * EN: UTC date-time stored as signed 64-bit milliseconds since the Unix epoch
 *
 * 可以表示超出日历库范围的时间；这类值在原始字节中无损往返，
 * 但转换为 RFC 3339 字符串或 `Date` 时会失败。
 * EN: Values outside what a calendar can express still round-trip through
 * raw bytes; only their textual or `Date` conversions fail.
 */
export class DateTime {
    /** 最早可表示时间 EN: Earliest representable instant */
    static readonly MIN = new DateTime(MIN_INT64);
    /** 最晚可表示时间 EN: Latest representable instant */
    static readonly MAX = new DateTime(MAX_INT64);

    private constructor(private readonly millis: bigint) {}

    /**
     * 从毫秒数创建
     * EN: Create from milliseconds since the epoch
     */
    static fromMillis(millis: number | bigint): DateTime {
        if (typeof millis === 'number') {
            if (!Number.isSafeInteger(millis)) {
                throw CodecError.invalidDateTime(`${millis} is not an integral millisecond count`);
            }
            return new DateTime(BigInt(millis));
        }
        if (!isInt64(millis)) {
            throw CodecError.invalidDateTime(`${millis} is out of the signed 64-bit range`);
        }
        return new DateTime(millis);
    }

    static fromDate(date: Date): DateTime {
        const time = date.getTime();
        if (Number.isNaN(time)) {
            throw CodecError.invalidDateTime('cannot convert an invalid Date');
        }
        return new DateTime(BigInt(time));
    }

    static now(): DateTime {
        return new DateTime(BigInt(Date.now()));
    }

    /**
     * 解析 RFC 3339 字符串（小数秒截断到毫秒）
     * EN: Parse an RFC 3339 string; fractional seconds are truncated to milliseconds
     */
    static parseRfc3339Str(input: string): DateTime {
        const match = RFC3339_PATTERN.exec(input);
        if (!match) {
            throw CodecError.invalidDateTime(`'${input}' is not an RFC 3339 date-time`);
        }

        const year = Number(match[1]);
        const month = Number(match[2]);
        const day = Number(match[3]);
        const hour = Number(match[4]);
        const minute = Number(match[5]);
        const second = Number(match[6]);
        const fraction = match[7] ?? '';

        if (month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month) ||
            hour > 23 || minute > 59 || second > 59) {
            throw CodecError.invalidDateTime(`'${input}' has an out-of-range component`);
        }

        let offsetMinutes = 0;
        if (match[8] === undefined) {
            const offsetHours = Number(match[10]);
            const offsetMins = Number(match[11]);
            if (offsetHours > 23 || offsetMins > 59) {
                throw CodecError.invalidDateTime(`'${input}' has an out-of-range UTC offset`);
            }
            offsetMinutes = (offsetHours * 60 + offsetMins) * (match[9] === '-' ? -1 : 1);
        }

        const millis = Number(fraction.slice(0, 3).padEnd(3, '0'));
        const days = daysFromCivil(year, month, day);
        const total = (((days * 24 + hour) * 60 + minute) * 60 + second) * 1000 + millis -
            offsetMinutes * 60_000;
        return new DateTime(BigInt(total));
    }

    /**
     * 毫秒时间戳
     * EN: Milliseconds since the epoch
     */
    get timestampMillis(): bigint {
        return this.millis;
    }

    /**
     * 转换为 JS Date；超出范围时失败
     * EN: Convert to a JS Date; fails outside the range Date supports
     */
    toDate(): Date {
        const millis = Number(this.millis);
        if (Math.abs(millis) > MAX_DATE_MILLIS) {
            throw CodecError.invalidDateTime(`DateTime(${this.millis}) is outside the range of Date`);
        }
        return new Date(millis);
    }

    /**
     * 格式化为 RFC 3339 字符串；年份须在 0000-9999 之间
     * EN: Format as an RFC 3339 string; the year must lie within 0000-9999
     */
    tryToRfc3339String(): string {
        const millis = Number(this.millis);
        const date = new Date(millis);
        const year = date.getUTCFullYear();
        if (Math.abs(millis) > MAX_DATE_MILLIS || Number.isNaN(year) || year < 0 || year > 9999) {
            throw CodecError.invalidDateTime(`cannot format DateTime(${this.millis}) as an RFC 3339 string`);
        }

        const iso = date.toISOString();
        const ms = date.getUTCMilliseconds();
        const base = iso.slice(0, 19);
        if (ms === 0) {
            return `${base}Z`;
        }
        const fraction = String(ms).padStart(3, '0').replace(/0+$/, '');
        return `${base}.${fraction}Z`;
    }

    compare(other: DateTime): number {
        if (this.millis < other.millis) return -1;
        if (this.millis > other.millis) return 1;
        return 0;
    }

    equals(other: DateTime): boolean {
        return this.millis === other.millis;
    }

    toString(): string {
        try {
            return this.tryToRfc3339String();
        } catch (err) {
            if (err instanceof CodecError) {
                return `DateTime(${this.millis})`;
            }
            throw err;
        }
    }
}

function isLeapYear(year: number): boolean {
    return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
    if (month === 2) {
        return isLeapYear(year) ? 29 : 28;
    }
    return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

// 公历日期到纪元日数（不依赖 Date 对两位数年份的特殊处理）
// EN: Civil date to days since the epoch, independent of Date's two-digit year handling
function daysFromCivil(year: number, month: number, day: number): number {
    const y = month <= 2 ? year - 1 : year;
    const era = Math.floor(y / 400);
    const yoe = y - era * 400;
    const doy = Math.floor((153 * (month + (month > 2 ? -3 : 9)) + 2) / 5) + day - 1;
    const doe = yoe * 365 + Math.floor(yoe / 4) - Math.floor(yoe / 100) + doy;
    return era * 146097 + doe - 719468;
}
