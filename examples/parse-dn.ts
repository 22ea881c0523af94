import { Dn, TooComplexDnError } from "../src/index.js";

const dn = Dn.parse("CN=Ada Lovelace, ou=People,dc=example,dc=com");
console.log(dn.size); // 4
console.log(dn.getRdn(0).value); // "Ada Lovelace"
console.log(dn.normalized); // "cn=Ada Lovelace,ou=People,dc=example,dc=com"
console.log(dn.toString()); // the input, unchanged

try {
  Dn.parse("cn=a+sn=b");
} catch (e) {
  if (e instanceof TooComplexDnError) console.log("needs the full parser at", e.position);
}
