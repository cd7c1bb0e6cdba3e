import type { NametagParams, ParamKey } from "./types";

// Shortest round-trip digits, fixed notation for exponents -4..15 and
// exponent notation (two-digit minimum) outside it; integral values keep ".0".
export function formatFloat(value: number): string {
  if (Object.is(value, -0)) return "-0.0";
  const [mantissa, exp] = value.toExponential().split("e");
  const exponent = Number(exp);
  if (exponent >= -4 && exponent < 16) {
    const fixed = String(value);
    return Number.isInteger(value) ? `${fixed}.0` : fixed;
  }
  const sign = exponent < 0 ? "-" : "+";
  return `${mantissa}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
}

// Values read from the CSV print as floats; compiled-in defaults print as written.
function formatParam(params: NametagParams, overrides: readonly ParamKey[], key: ParamKey): string {
  const value = params[key];
  return overrides.includes(key) ? formatFloat(value) : String(value);
}

export function buildNametagScad(name: string, params: NametagParams, overrides: readonly ParamKey[] = []): string {
  // The name goes in verbatim. A double quote in it breaks the string literal;
  // existing output depends on this, so it is not escaped.
  return `// Auto-generated nametag for: ${name}

// Parameters
name = "${name}";
nametag_width = ${formatParam(params, overrides, "nametag_width")};
nametag_height = ${formatParam(params, overrides, "nametag_height")};
nametag_thickness = ${formatParam(params, overrides, "nametag_thickness")};
text_size = ${formatParam(params, overrides, "text_size")};
text_height = ${formatParam(params, overrides, "text_height")};
ring_width = ${formatParam(params, overrides, "ring_width")};
ring_height = ${formatParam(params, overrides, "ring_height")};
mounting_hole_diameter = ${formatParam(params, overrides, "mounting_hole_diameter")};
corner_radius = ${formatParam(params, overrides, "corner_radius")};

// Main nametag module
module nametag() {
    difference() {
        union() {
            // Main body: rectangle on one side, semicircle on the other
            nametag_body(nametag_width, nametag_height, nametag_thickness, corner_radius);
            
            // Elevated ring around the border
            elevated_ring(nametag_width, nametag_height, nametag_thickness, ring_width, ring_height, corner_radius);
            
            // Raised text on top
            translate([nametag_width/2, nametag_height/2, nametag_thickness])
                linear_extrude(height = text_height)
                    text(name, size = text_size, halign = "center", valign = "center", font = "Liberation Sans:style=Bold");
        }
        
        // Mounting hole in the center of the circular side
        translate([nametag_width, nametag_height/2, -0.5])
            cylinder(h = nametag_thickness + ring_height + text_height + 1, d = mounting_hole_diameter, $fn = 30);
    }
}

// Module to create the main body shape (rectangle + semicircle)
module nametag_body(width, height, thickness, radius) {
    hull() {
        // Rectangular side with rounded corners (left side)
        translate([radius, radius, 0])
            cylinder(r = radius, h = thickness, $fn = 30);
        translate([radius, height - radius, 0])
            cylinder(r = radius, h = thickness, $fn = 30);
        
        // Semicircle on the right side
        translate([width, height/2, 0])
            cylinder(r = height/2, h = thickness, $fn = 60);
    }
}

// Module to create the elevated ring
module elevated_ring(width, height, thickness, ring_w, ring_h, radius) {
    difference() {
        // Outer shape (same as body but elevated)
        translate([0, 0, thickness])
            hull() {
                // Rectangular side with rounded corners
                translate([radius, radius, 0])
                    cylinder(r = radius, h = ring_h, $fn = 30);
                translate([radius, height - radius, 0])
                    cylinder(r = radius, h = ring_h, $fn = 30);
                
                // Semicircle on the right side
                translate([width, height/2, 0])
                    cylinder(r = height/2, h = ring_h, $fn = 60);
            }
        
        // Inner cutout (smaller shape)
        translate([0, 0, thickness - 0.5])
            hull() {
                // Inner rectangular side
                translate([radius + ring_w, radius + ring_w, 0])
                    cylinder(r = radius, h = ring_h + 1, $fn = 30);
                translate([radius + ring_w, height - radius - ring_w, 0])
                    cylinder(r = radius, h = ring_h + 1, $fn = 30);
                
                // Inner semicircle (smaller radius)
                translate([width, height/2, 0])
                    cylinder(r = height/2 - ring_w, h = ring_h + 1, $fn = 60);
            }
    }
}

// Generate the nametag
nametag();
`;
}
