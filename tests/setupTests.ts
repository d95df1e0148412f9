// Keep runs independent of the developer's shell
delete process.env.PD_ZERO_PREFIX;
delete process.env.PD_PRODUCTION;
delete process.env.PD_VERBOSE;
process.env.NO_COLOR = '1';
