import { Control, SortRequest, encodeControl, toHex } from "../src/index.js";

const paged = new Control("1.2.840.113556.1.4.319", true);
console.log(toHex(encodeControl(paged)));
// 301b0416312e322e3834302e3131333535362e312e342e3331390101ff

const sort = new SortRequest([{ attributeType: "cn", reverseOrder: true }]);
console.log(toHex(encodeControl(sort.toControl())));
