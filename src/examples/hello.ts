import { convertCsg } from "../index.js";

const source = `
group() {
	multmatrix([[1, 0, 0, 10], [0, 1, 0, 0], [0, 0, 1, 0], [0, 0, 0, 1]]) {
		difference() {
			cube(size = [20, 20, 5], center = true);
			cylinder($fn = 0, $fa = 12, $fs = 2, h = 6, r1 = 3, r2 = 3, center = true);
		}
	}
	linear_extrude(height = 10, center = false, convexity = 1, twist = 90, slices = 4, scale = [0.5, 0.5], $fn = 0, $fa = 12, $fs = 2) {
		square(size = [4, 4], center = true);
	}
	group();
}
`;

const result = convertCsg(source);
if (!result.ok) {
  console.error(result.error.message);
  process.exit(1);
}
console.log(result.xml);
