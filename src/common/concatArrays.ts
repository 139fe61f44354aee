export default function concatArrays<T>(arr: T[][]): T[] {
  const ret: T[] = [];
  for (const subArr of arr) {
    for (const item of subArr) {
      ret.push(item);
    }
  }
  return ret;
}
