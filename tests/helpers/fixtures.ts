// Small VCD sources shared by the tests

export const HEADER = `$date
	Mon Jan  1 00:00:00 2024
$end
$version
	test bench
$end
$timescale
	1ns
$end
$scope module top $end
$var wire 1 ! clk $end
$var wire 1 " rst_n $end
$var wire 8 # data [7:0] $end
$var wire 4 % asc [0:3] $end
$scope module sub $end
$var wire 1 ! clk_alias $end
$upscope $end
$upscope $end
$enddefinitions $end
`;

export function vcd(body: string, header: string = HEADER): string {
  return header + body.replace(/^\n/, '');
}

// Scenario with one scalar and one 2-bit bus
export const CLK_AND_DATA = `$timescale 1ns $end
$scope module top $end
$var wire 1 ! clk $end
$var wire 2 " data [1:0] $end
$upscope $end
$enddefinitions $end
#0
1!
b10 "
#5
0!
`;
