
/*
  byte -> occurrence count
*/
export type FreqMap = Map<number, number>;

export function getFreqMap(bytes: Uint8Array): FreqMap {
  let freqMap: FreqMap;
  freqMap = new Map();
  for(let i = 0; i < bytes.length; ++i) {
    let currByte = bytes[i];
    let currCount = freqMap.get(currByte);
    if(currCount === undefined) {
      currCount = 0;
    }
    currCount++;
    freqMap.set(currByte, currCount);
  }
  return freqMap;
}

export function getFreqTotal(freqMap: FreqMap): number {
  let total: number;
  total = 0;
  for(let count of freqMap.values()) {
    total += count;
  }
  return total;
}
