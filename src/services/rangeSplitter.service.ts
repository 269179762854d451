import { InvalidDomainException } from "@/exceptions/PlannerException";
import { KeyBound, KeyDomain, KeyRange, KeyValue } from "@/interfaces/keyRange.interface";
import { boundsEqual, compareBounds, compareValues, formatBound, GLOBAL_MAX, GLOBAL_MIN, MIN_KEY } from "@/models/keyBound.model";

class RangeSplitterService {
  /**
   * Splits the key domain into `splitCount` half-open ranges. Interior boundaries
   * sit on evenly spaced primary values, paired with MinKey on the tiebreaker so a
   * boundary never falls between two documents sharing a primary value.
   */
  public split(domain: KeyDomain, splitCount: number): KeyRange[] {
    if (!Number.isInteger(splitCount) || splitCount < 1) {
      throw new InvalidDomainException(`split count must be an integer >= 1, got ${splitCount}`);
    }
    const valueAt = this.domainAccessor(domain);
    const distinct = this.distinctCount(domain);
    if (distinct < BigInt(splitCount)) {
      throw new InvalidDomainException(`${distinct} distinct values cannot form ${splitCount} ranges`);
    }

    const bounds: KeyBound[] = [GLOBAL_MIN];
    for (let i = 1; i < splitCount; i++) {
      const position = (BigInt(i) * distinct) / BigInt(splitCount);
      bounds.push({ primary: valueAt(position), tiebreaker: MIN_KEY });
    }
    bounds.push(GLOBAL_MAX);

    const ranges: KeyRange[] = [];
    for (let i = 0; i < splitCount; i++) {
      ranges.push({ lowerBound: bounds[i], upperBound: bounds[i + 1] });
    }
    this.assertPartition(ranges);
    return ranges;
  }

  public boundaries(ranges: readonly KeyRange[]): KeyBound[] {
    if (ranges.length === 0) {
      return [];
    }
    return [...ranges.map(range => range.lowerBound), ranges[ranges.length - 1].upperBound];
  }

  // ranges must be non-empty, contiguous and span [GLOBAL_MIN, GLOBAL_MAX)
  public assertPartition(ranges: readonly KeyRange[]): void {
    if (ranges.length === 0) {
      throw new InvalidDomainException("no ranges");
    }
    if (!boundsEqual(ranges[0].lowerBound, GLOBAL_MIN)) {
      throw new InvalidDomainException(`first range starts at ${formatBound(ranges[0].lowerBound)}, not MinKey`);
    }
    const last = ranges[ranges.length - 1];
    if (!boundsEqual(last.upperBound, GLOBAL_MAX)) {
      throw new InvalidDomainException(`last range ends at ${formatBound(last.upperBound)}, not MaxKey`);
    }
    ranges.forEach((range, i) => {
      if (compareBounds(range.lowerBound, range.upperBound) >= 0) {
        throw new InvalidDomainException(`range ${i} is empty: ${formatBound(range.lowerBound)} >= ${formatBound(range.upperBound)}`);
      }
      const next = ranges[i + 1];
      if (next !== undefined && !boundsEqual(range.upperBound, next.lowerBound)) {
        throw new InvalidDomainException(`gap or overlap between range ${i} and ${i + 1}`);
      }
    });
  }

  private distinctCount(domain: KeyDomain): bigint {
    if (domain.kind === "integer") {
      return BigInt(domain.max) - BigInt(domain.min) + 1n;
    }
    return BigInt(domain.values.length);
  }

  private domainAccessor(domain: KeyDomain): (position: bigint) => KeyValue {
    if (domain.kind === "integer") {
      const { min, max } = domain;
      if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max)) {
        throw new InvalidDomainException(`integer bounds must be safe integers, got [${min}, ${max}]`);
      }
      if (min > max) {
        throw new InvalidDomainException(`min ${min} is greater than max ${max}`);
      }
      return position => Number(BigInt(min) + position);
    }
    const { values } = domain;
    values.forEach((value, i) => {
      if (typeof value === "number" && !Number.isFinite(value)) {
        throw new InvalidDomainException(`value at ${i} is not finite`);
      }
      if (i > 0 && compareValues(values[i - 1], value) >= 0) {
        throw new InvalidDomainException(`values must be strictly ascending, ${JSON.stringify(values[i - 1])} >= ${JSON.stringify(value)}`);
      }
    });
    return position => values[Number(position)];
  }
}

const rangeSplitterService = new RangeSplitterService();
export { RangeSplitterService };
export default rangeSplitterService;
