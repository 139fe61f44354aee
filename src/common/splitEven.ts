// Split items into `numPartitions` contiguous slices. The first
// `length % numPartitions` slices take one extra item.
export default function splitEven<T>(arr: T[], numPartitions: number): T[][] {
  const ret: T[][] = [];

  const rest = arr.length % numPartitions;
  const eachCount = (arr.length - rest) / numPartitions;

  let index = 0;
  for (let i = 0; i < numPartitions; i++) {
    const subCount = i < rest ? eachCount + 1 : eachCount;
    const end = index + subCount;
    ret.push(arr.slice(index, end));
    index = end;
  }
  return ret;
}
